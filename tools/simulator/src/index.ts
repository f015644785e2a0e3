import {
  formatMarkdownSummary,
  formatSweepSummary,
  runBatchSweep,
  runSimulation,
} from './lib';
import type { SimulationConfig } from './lib';

const args = process.argv.slice(2);

const parseFlags = (values: string[]): Record<string, string> => {
  const result: Record<string, string> = {};
  for (let i = 0; i < values.length; i += 1) {
    const token = values[i];
    if (!token.startsWith('--')) {
      continue;
    }
    const key = token.slice(2);
    const value = values[i + 1];
    if (value === undefined || value.startsWith('--')) {
      result[key] = 'true';
    } else {
      result[key] = value;
      i += 1;
    }
  }
  return result;
};

const flags = parseFlags(args.slice(4));
const config: SimulationConfig = {
  nodes: Number(args[0] ?? 50),
  requests: Number(args[1] ?? 500),
  seed: Number(args[2] ?? 42),
  batchSize: Number(flags.batch ?? 1),
  policy: flags.policy === 'marketplace' ? 'marketplace' : 'headroom',
};
const scenario = args[3] ?? 'baseline';

if (scenario === 'sweep') {
  const batchSizes = (flags.sizes ?? '1,5,25,100')
    .split(',')
    .map((value) => Number(value))
    .filter((value) => Number.isFinite(value) && value > 0);

  const report = runBatchSweep(config, batchSizes);
  console.log(JSON.stringify(report, null, 2));
  console.log('\n---\n');
  console.log(formatSweepSummary(report));
} else {
  const metrics = runSimulation(config);
  console.log(JSON.stringify(metrics, null, 2));
  console.log('\n---\n');
  console.log(formatMarkdownSummary(metrics));
}
