import { Counter, collectDefaultMetrics, Histogram, Registry } from 'prom-client';
import { trace } from '@opentelemetry/api';

export const placementRegistry = new Registry();
collectDefaultMetrics({ register: placementRegistry });

export const placementDecisions = new Counter({
  name: 'placement_decisions_total',
  help: 'Placement decisions produced by the engine',
  labelNames: ['mode', 'policy', 'outcome'],
  registers: [placementRegistry],
});

export const placementEvaluationDuration = new Histogram({
  name: 'placement_evaluation_duration_seconds',
  help: 'Time spent filtering, scoring and selecting for one request',
  labelNames: ['mode'],
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [placementRegistry],
});

export const placementInvalidRequests = new Counter({
  name: 'placement_invalid_requests_total',
  help: 'Requests rejected before filtering',
  registers: [placementRegistry],
});

export const placementSnapshotFailures = new Counter({
  name: 'placement_snapshot_failures_total',
  help: 'Node directory snapshot acquisitions that failed',
  registers: [placementRegistry],
});

export const placementTracer = trace.getTracer('placement');
