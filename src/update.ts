import {
  clientAddress,
  isValidAddress,
  type RequestOrigin,
} from './address.js';
import { checkBasicAuth, type BasicAuthCredentials } from './auth.js';
import type { Logger } from './logger.js';
import type { RecordProvider, RemoteRecord } from './provider.js';

/** An inbound DynDNS update call */
export interface UpdateRequest extends RequestOrigin {
  hostname?: string;
  /** The `myip` parameter; derived from the origin when absent */
  requestedAddress?: string;
  /** Raw `Authorization` header */
  authorization?: string;
}

export type RejectReason = 'badauth' | 'notfqdn' | 'badip';

export type UpdateOutcome =
  | { kind: 'good'; address: string }
  | { kind: 'nochg'; address: string }
  | { kind: 'rejected'; reason: RejectReason }
  | { kind: 'failed' };

export interface UpdateDeps {
  provider: RecordProvider;
  logger: Logger;
  /** Basic Auth is enforced only when set */
  basicAuth?: BasicAuthCredentials;
}

/** Plain-text DynDNS response */
export interface DynDnsResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * Reconcile one hostname with the requested (or inferred) address.
 *
 * 1. Checks Basic Auth, hostname and address syntax, in that order
 * 2. Fetches the current record from the provider
 * 3. Returns `nochg` when the content already matches, otherwise writes it and returns `good`
 *
 * Never rejects: provider failures are logged and reported as `failed`.
 */
export async function handleUpdate(
  request: UpdateRequest,
  deps: UpdateDeps
): Promise<UpdateOutcome> {
  const { provider, logger, basicAuth } = deps;

  if (basicAuth && !checkBasicAuth(request.authorization, basicAuth)) {
    return { kind: 'rejected', reason: 'badauth' };
  }

  const hostname = request.hostname ?? '';
  if (!hostname) {
    return { kind: 'rejected', reason: 'notfqdn' };
  }

  const address = request.requestedAddress || clientAddress(request);
  if (!isValidAddress(address)) {
    return { kind: 'rejected', reason: 'badip' };
  }

  logger.info({ hostname, address }, 'Updating DNS record');

  let record: RemoteRecord;
  try {
    record = await provider.fetchRecord(hostname);
  } catch (err) {
    logger.error({ err, hostname }, 'Failed to fetch DNS record');
    return { kind: 'failed' };
  }

  if (record.address === address) {
    logger.debug({ hostname, address }, 'DNS record already up to date');
    return { kind: 'nochg', address };
  }

  try {
    await provider.updateRecord(record.id, hostname, address);
  } catch (err) {
    logger.error(
      { err, hostname, recordId: record.id },
      'Failed to update DNS record'
    );
    return { kind: 'failed' };
  }

  logger.info(
    { hostname, address, previous: record.address },
    'DNS record updated'
  );
  return { kind: 'good', address };
}

const AUTH_CHALLENGE = 'Basic realm="DynDNS"';

export function renderOutcome(outcome: UpdateOutcome): DynDnsResponse {
  switch (outcome.kind) {
    case 'good':
      return { status: 200, body: `good ${outcome.address}`, headers: {} };
    case 'nochg':
      return { status: 200, body: `nochg ${outcome.address}`, headers: {} };
    case 'rejected':
      if (outcome.reason === 'badauth') {
        return {
          status: 401,
          body: 'badauth',
          headers: { 'WWW-Authenticate': AUTH_CHALLENGE },
        };
      }
      return { status: 400, body: outcome.reason, headers: {} };
    case 'failed':
      return { status: 500, body: '911', headers: {} };
  }
}

/** Liveness probe; independent of configuration and provider */
export function handleHealth(): DynDnsResponse {
  return { status: 200, body: 'OK', headers: {} };
}
