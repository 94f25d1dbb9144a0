import express, { type Express, type Request, type Response } from 'express';
import type { BasicAuthCredentials } from './auth.js';
import type { Logger } from './logger.js';
import type { RecordProvider } from './provider.js';
import {
  handleHealth,
  handleUpdate,
  renderOutcome,
  type DynDnsResponse,
  type UpdateRequest,
} from './update.js';

export interface AppOptions {
  provider: RecordProvider;
  logger: Logger;
  basicAuth?: BasicAuthCredentials;
}

/** Repeated query parameters resolve to their first value */
function firstQueryValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

function toUpdateRequest(req: Request): UpdateRequest {
  return {
    hostname: firstQueryValue(req.query.hostname),
    requestedAddress: firstQueryValue(req.query.myip),
    authorization: req.get('Authorization'),
    forwardedFor: req.get('X-Forwarded-For'),
    realIp: req.get('X-Real-IP'),
    remoteAddress: req.socket.remoteAddress,
  };
}

function send(res: Response, response: DynDnsResponse): void {
  res
    .status(response.status)
    .set(response.headers)
    .type('text/plain')
    .send(response.body);
}

/**
 * Build the HTTP application: `GET /nic/update` (DynDNS protocol) and
 * `GET /health` (liveness).
 */
export function createApp(options: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get('/health', (_req, res) => {
    send(res, handleHealth());
  });

  app.get('/nic/update', (req, res, next) => {
    handleUpdate(toUpdateRequest(req), options)
      .then((outcome) => send(res, renderOutcome(outcome)))
      .catch(next);
  });

  return app;
}
