import { z } from 'zod';
import { recordTypeFor } from '../address.js';
import { ProviderError, RecordNotFoundError } from '../errors.js';
import type { RecordProvider, RemoteRecord } from '../provider.js';

export interface CloudflareOptions {
  apiToken: string;
  zoneId: string;
  /** Upper bound for each API call, in milliseconds (default 10 000) */
  timeoutMs?: number;
  /** Override the API base URL */
  baseUrl?: string;
}

const CF_API = 'https://api.cloudflare.com/client/v4';

const DEFAULT_TIMEOUT_MS = 10_000;

/** `ttl: 1` is Cloudflare's "automatic" TTL */
const AUTOMATIC_TTL = 1;

const envelopeSchema = z.object({
  success: z.boolean(),
  errors: z
    .array(z.object({ code: z.number(), message: z.string() }))
    .nullish(),
  result: z.unknown(),
});

const dnsRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  content: z.string(),
});

type CloudflareDnsRecord = z.infer<typeof dnsRecordSchema>;

interface CfRequest {
  apiToken: string;
  baseUrl: string;
  timeoutMs: number;
}

function isTimeout(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'name' in err &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}

async function cfFetch<T>(
  req: CfRequest,
  path: string,
  resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  init?: RequestInit
): Promise<T> {
  const headers = new Headers(init?.headers);
  headers.set('Authorization', `Bearer ${req.apiToken}`);
  headers.set('Content-Type', 'application/json');

  let res: Response;
  try {
    res = await fetch(`${req.baseUrl}${path}`, {
      ...init,
      headers,
      signal: AbortSignal.timeout(req.timeoutMs),
    });
  } catch (err) {
    if (isTimeout(err)) {
      throw new ProviderError(
        `Cloudflare API request timed out after ${req.timeoutMs}ms`,
        { cause: err }
      );
    }
    throw new ProviderError('Cloudflare API request failed', { cause: err });
  }

  if (!res.ok) {
    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw new ProviderError(
        `Cloudflare API error ${res.status}: response body unreadable`,
        { status: res.status, cause: err }
      );
    }
    throw new ProviderError(`Cloudflare API error ${res.status}: ${text}`, {
      status: res.status,
    });
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new ProviderError('Cloudflare API returned invalid JSON', {
      status: res.status,
      cause: err,
    });
  }

  const envelope = envelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new ProviderError('Cloudflare API returned a malformed envelope', {
      status: res.status,
      cause: envelope.error,
    });
  }

  if (!envelope.data.success) {
    const errorDetails =
      envelope.data.errors?.map((e) => `${e.code}: ${e.message}`).join(', ') ||
      'unknown error';
    throw new ProviderError(`Cloudflare API error: ${errorDetails}`, {
      status: res.status,
    });
  }

  const result = resultSchema.safeParse(envelope.data.result);
  if (!result.success) {
    throw new ProviderError('Cloudflare API returned a malformed result', {
      status: res.status,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Create a Cloudflare record provider.
 *
 * Uses Cloudflare API v4 with native `fetch`. Every call is aborted after
 * `timeoutMs` and surfaces as a `ProviderError`.
 */
export function cloudflare(options: CloudflareOptions): RecordProvider {
  const { apiToken, zoneId } = options;

  if (!apiToken) {
    throw new Error('Cloudflare: apiToken is required');
  }
  if (!zoneId) {
    throw new Error('Cloudflare: zoneId is required');
  }

  const req: CfRequest = {
    apiToken,
    baseUrl: options.baseUrl ?? CF_API,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
  };

  return {
    async fetchRecord(hostname: string): Promise<RemoteRecord> {
      const records: CloudflareDnsRecord[] = await cfFetch(
        req,
        `/zones/${zoneId}/dns_records?name=${encodeURIComponent(hostname)}`,
        z.array(dnsRecordSchema)
      );

      const first = records[0];
      if (!first) {
        throw new RecordNotFoundError(hostname);
      }
      return { id: first.id, address: first.content };
    },

    async updateRecord(
      recordId: string,
      hostname: string,
      address: string
    ): Promise<void> {
      await cfFetch(
        req,
        `/zones/${zoneId}/dns_records/${encodeURIComponent(recordId)}`,
        z.unknown(),
        {
          method: 'PUT',
          body: JSON.stringify({
            type: recordTypeFor(address),
            name: hostname,
            content: address,
            ttl: AUTOMATIC_TTL,
            proxied: false,
          }),
        }
      );
    },
  };
}
