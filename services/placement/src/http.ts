import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { checkQuoteAccess } from './authz';
import { isPlacementError } from './errors';
import { logError, logWarn } from './logging';
import { placementRegistry } from './observability';
import type { RateLimiter } from './rate-limit';
import {
  getPlacement,
  listModelProfiles,
  listPlacements,
  matchNodes,
  placeRequest,
  quote,
} from './server';
import type { PlacementService } from './server';
import { bodyErrorStatus, headerValue, readJsonBody, sendJson } from './utils/http';

const REQUESTS_PATH = '/placement/requests';
const REQUESTER_HEADER = 'x-requester-id';
const API_KEY_HEADER = 'x-api-key';

const ERROR_STATUS = {
  'invalid-request': 400,
  'request-conflict': 409,
  'snapshot-unavailable': 503,
} as const;

const sendError = (res: ServerResponse, error: unknown): void => {
  if (isPlacementError(error)) {
    const status = ERROR_STATUS[error.code];
    if (error.details.length > 0) {
      return sendJson(res, status, { error: error.code, details: error.details });
    }
    return sendJson(res, status, { error: error.code, message: error.message });
  }
  logError('[placement] request failed', error);
  return sendJson(res, 500, { error: 'internal-error' });
};

const parsePositiveInt = (
  name: string,
  raw: string | null,
): { ok: true; value: number | undefined } | { ok: false; error: string } => {
  if (raw === null || raw === '') {
    return { ok: true, value: undefined };
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    return { ok: false, error: `${name}: must be a positive integer` };
  }
  return { ok: true, value };
};

export const createPlacementHttpServer = (
  service: PlacementService,
  quoteRateLimiter?: RateLimiter | null,
): http.Server => {
  const { config } = service;
  const startedAtMs = Date.now();

  const readBody = async (
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<{ ok: true; value: unknown } | { ok: false }> => {
    const body = await readJsonBody(req, config.maxRequestBytes);
    if (!body.ok) {
      sendJson(res, bodyErrorStatus(body.error), { error: body.error });
      return { ok: false };
    }
    return body;
  };

  const requireRequester = (req: IncomingMessage, res: ServerResponse): string | null => {
    const requesterId = headerValue(req, REQUESTER_HEADER);
    if (!requesterId) {
      sendJson(res, 401, { error: 'unauthorized', message: `${REQUESTER_HEADER} header is required` });
      return null;
    }
    return requesterId;
  };

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname;

    if (req.method === 'GET' && path === '/health') {
      return sendJson(res, 200, { ok: true });
    }

    if (req.method === 'GET' && path === '/status') {
      const base = {
        ok: true,
        serviceId: config.serviceId,
        uptimeMs: Date.now() - startedAtMs,
        policy: config.policy,
        quoteApiEnabled: Boolean(config.apiKeys?.length),
      };
      try {
        const snapshot = await service.directory.snapshot();
        return sendJson(res, 200, {
          ...base,
          directory: {
            capturedAtMs: snapshot.capturedAtMs,
            total: snapshot.nodes.length,
            active: snapshot.nodes.filter((node) => node.active).length,
          },
        });
      } catch (error) {
        logWarn('[placement] status could not read the node directory', error);
        return sendJson(res, 200, { ...base, directory: { error: 'snapshot-unavailable' } });
      }
    }

    if (req.method === 'GET' && path === '/metrics') {
      const metrics = await placementRegistry.metrics();
      res.setHeader('content-type', placementRegistry.contentType);
      res.end(metrics);
      return;
    }

    if (req.method === 'GET' && path === '/model-profiles') {
      return sendJson(res, 200, { profiles: listModelProfiles(service) });
    }

    if (req.method === 'POST' && path === REQUESTS_PATH) {
      const requesterId = requireRequester(req, res);
      if (!requesterId) {
        return;
      }
      const body = await readBody(req, res);
      if (!body.ok) {
        return;
      }
      const record = await placeRequest(service, body.value, requesterId);
      return sendJson(res, 201, record);
    }

    if (req.method === 'GET' && path === REQUESTS_PATH) {
      const limit = parsePositiveInt('limit', url.searchParams.get('limit'));
      if (!limit.ok) {
        return sendJson(res, 400, { error: 'invalid-request', details: [limit.error] });
      }
      const placements = await listPlacements(service, {
        organizationId: url.searchParams.get('organizationId') ?? undefined,
        requesterId: url.searchParams.get('requesterId') ?? undefined,
        limit: limit.value,
      });
      return sendJson(res, 200, { placements });
    }

    if (req.method === 'GET' && path.startsWith(`${REQUESTS_PATH}/`)) {
      let requestId: string;
      try {
        requestId = decodeURIComponent(path.slice(REQUESTS_PATH.length + 1));
      } catch {
        return sendJson(res, 400, { error: 'invalid-request', details: ['requestId: malformed'] });
      }
      const record = requestId ? await getPlacement(service, requestId) : null;
      if (!record) {
        return sendJson(res, 404, { error: 'not-found' });
      }
      return sendJson(res, 200, record);
    }

    if (req.method === 'POST' && path === '/public/placement/quote') {
      const access = checkQuoteAccess(config, headerValue(req, API_KEY_HEADER));
      if (!access.ok) {
        return sendJson(res, access.status, { error: access.error });
      }
      if (quoteRateLimiter && !quoteRateLimiter.allow(access.requesterId)) {
        return sendJson(res, 429, { error: 'rate-limited' });
      }
      const body = await readBody(req, res);
      if (!body.ok) {
        return;
      }
      const decision = await quote(service, body.value, access.requesterId);
      return sendJson(res, 200, { decision });
    }

    if (req.method === 'POST' && path === '/marketplace/matches') {
      const requesterId = requireRequester(req, res);
      if (!requesterId) {
        return;
      }
      const topK = parsePositiveInt('topK', url.searchParams.get('topK'));
      if (!topK.ok) {
        return sendJson(res, 400, { error: 'invalid-request', details: [topK.error] });
      }
      const body = await readBody(req, res);
      if (!body.ok) {
        return;
      }
      const matches = await matchNodes(service, body.value, requesterId, topK.value);
      return sendJson(res, 200, { matches });
    }

    return sendJson(res, 404, { error: 'not-found' });
  };

  const handler = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    try {
      await route(req, res);
    } catch (error) {
      if (res.headersSent) {
        logError('[placement] failed after response started', error);
        res.end();
        return;
      }
      sendError(res, error);
    }
  };

  return http.createServer((req, res) => {
    void handler(req, res);
  });
};
