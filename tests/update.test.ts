import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { ProviderError, RecordNotFoundError } from '../src/errors.js';
import type { RecordProvider, RemoteRecord } from '../src/provider.js';
import {
  handleHealth,
  handleUpdate,
  renderOutcome,
  type UpdateRequest,
} from '../src/update.js';

const logger = pino({ level: 'silent' });

function createFakeProvider(
  records: Record<string, RemoteRecord> = {},
  failures: { fetch?: Error; update?: Error } = {}
): RecordProvider & {
  fetchCalls: string[];
  updateCalls: { recordId: string; hostname: string; address: string }[];
} {
  const fetchCalls: string[] = [];
  const updateCalls: { recordId: string; hostname: string; address: string }[] =
    [];

  return {
    fetchCalls,
    updateCalls,
    async fetchRecord(hostname: string) {
      fetchCalls.push(hostname);
      if (failures.fetch) throw failures.fetch;
      const record = records[hostname];
      if (!record) throw new RecordNotFoundError(hostname);
      return record;
    },
    async updateRecord(recordId: string, hostname: string, address: string) {
      updateCalls.push({ recordId, hostname, address });
      if (failures.update) throw failures.update;
      records[hostname] = { id: recordId, address };
    },
  };
}

function basic(credentials: string): string {
  return `Basic ${Buffer.from(credentials).toString('base64')}`;
}

const existing = { 'test.example.com': { id: 'rec123', address: '1.1.1.1' } };

describe('handleUpdate', () => {
  it('updates the record when the address changed', async () => {
    const provider = createFakeProvider({ ...existing });

    const outcome = await handleUpdate(
      { hostname: 'test.example.com', requestedAddress: '1.2.3.4' },
      { provider, logger }
    );

    expect(outcome).toEqual({ kind: 'good', address: '1.2.3.4' });
    expect(provider.updateCalls).toEqual([
      { recordId: 'rec123', hostname: 'test.example.com', address: '1.2.3.4' },
    ]);
  });

  it('skips the write when the address is unchanged', async () => {
    const provider = createFakeProvider({ ...existing });

    const outcome = await handleUpdate(
      { hostname: 'test.example.com', requestedAddress: '1.1.1.1' },
      { provider, logger }
    );

    expect(outcome).toEqual({ kind: 'nochg', address: '1.1.1.1' });
    expect(provider.fetchCalls).toEqual(['test.example.com']);
    expect(provider.updateCalls).toHaveLength(0);
  });

  it('rejects a missing hostname before calling the provider', async () => {
    const provider = createFakeProvider({ ...existing });

    const outcome = await handleUpdate(
      { requestedAddress: 'not-an-ip' },
      { provider, logger }
    );

    expect(outcome).toEqual({ kind: 'rejected', reason: 'notfqdn' });
    expect(provider.fetchCalls).toHaveLength(0);
  });

  it('rejects an empty hostname', async () => {
    const provider = createFakeProvider();

    const outcome = await handleUpdate(
      { hostname: '', requestedAddress: '1.2.3.4' },
      { provider, logger }
    );

    expect(outcome).toEqual({ kind: 'rejected', reason: 'notfqdn' });
  });

  it.each(['192.168.1', '192.168.1.1.1', 'garbage', '1.2..4'])(
    'rejects the malformed address %j',
    async (address) => {
      const provider = createFakeProvider({ ...existing });

      const outcome = await handleUpdate(
        { hostname: 'test.example.com', requestedAddress: address },
        { provider, logger }
      );

      expect(outcome).toEqual({ kind: 'rejected', reason: 'badip' });
      expect(provider.fetchCalls).toHaveLength(0);
    }
  );

  it('accepts an IPv6 address', async () => {
    const provider = createFakeProvider({ ...existing });

    const outcome = await handleUpdate(
      { hostname: 'test.example.com', requestedAddress: '2001:db8::1' },
      { provider, logger }
    );

    expect(outcome).toEqual({ kind: 'good', address: '2001:db8::1' });
  });

  describe('address derivation', () => {
    const cases: [string, UpdateRequest, string][] = [
      [
        'X-Forwarded-For wins over X-Real-IP',
        {
          forwardedFor: '10.0.0.1, 10.0.0.2',
          realIp: '10.0.0.3',
          remoteAddress: '192.168.1.1:12345',
        },
        '10.0.0.1',
      ],
      [
        'X-Real-IP wins over the peer address',
        { realIp: '10.0.0.3', remoteAddress: '192.168.1.1:12345' },
        '10.0.0.3',
      ],
      [
        'peer address without port',
        { remoteAddress: '192.168.1.1:12345' },
        '192.168.1.1',
      ],
    ];

    it.each(cases)('%s', async (_name, origin, expected) => {
      const provider = createFakeProvider({ ...existing });

      const outcome = await handleUpdate(
        { hostname: 'test.example.com', ...origin },
        { provider, logger }
      );

      expect(outcome).toEqual({ kind: 'good', address: expected });
      expect(provider.updateCalls[0]?.address).toBe(expected);
    });

    it('uses myip over any header', async () => {
      const provider = createFakeProvider({ ...existing });

      const outcome = await handleUpdate(
        {
          hostname: 'test.example.com',
          requestedAddress: '5.6.7.8',
          forwardedFor: '10.0.0.1',
        },
        { provider, logger }
      );

      expect(outcome).toEqual({ kind: 'good', address: '5.6.7.8' });
    });
  });

  describe('basic auth', () => {
    const basicAuth = { username: 'testuser', password: 'testpass' };

    it.each([
      ['missing', undefined],
      ['malformed', 'Bearer token123'],
      ['wrong password', basic('testuser:wrongpass')],
      ['wrong username', basic('wronguser:testpass')],
    ])('rejects %s credentials without calling the provider', async (_name, header) => {
      const provider = createFakeProvider({ ...existing });

      const outcome = await handleUpdate(
        {
          hostname: 'test.example.com',
          requestedAddress: '1.2.3.4',
          authorization: header,
        },
        { provider, logger, basicAuth }
      );

      expect(outcome).toEqual({ kind: 'rejected', reason: 'badauth' });
      expect(provider.fetchCalls).toHaveLength(0);
    });

    it('checks credentials before the hostname', async () => {
      const provider = createFakeProvider();

      const outcome = await handleUpdate({}, { provider, logger, basicAuth });

      expect(outcome).toEqual({ kind: 'rejected', reason: 'badauth' });
    });

    it('proceeds with matching credentials', async () => {
      const provider = createFakeProvider({ ...existing });

      const outcome = await handleUpdate(
        {
          hostname: 'test.example.com',
          requestedAddress: '1.2.3.4',
          authorization: basic('testuser:testpass'),
        },
        { provider, logger, basicAuth }
      );

      expect(outcome).toEqual({ kind: 'good', address: '1.2.3.4' });
    });
  });

  describe('provider failures', () => {
    it('fails when the record does not exist', async () => {
      const provider = createFakeProvider();

      const outcome = await handleUpdate(
        { hostname: 'missing.example.com', requestedAddress: '1.2.3.4' },
        { provider, logger }
      );

      expect(outcome).toEqual({ kind: 'failed' });
      expect(provider.updateCalls).toHaveLength(0);
    });

    it('fails when the fetch errors', async () => {
      const provider = createFakeProvider(
        { ...existing },
        { fetch: new ProviderError('Cloudflare API error 403: Forbidden') }
      );

      const outcome = await handleUpdate(
        { hostname: 'test.example.com', requestedAddress: '1.2.3.4' },
        { provider, logger }
      );

      expect(outcome).toEqual({ kind: 'failed' });
      expect(provider.updateCalls).toHaveLength(0);
    });

    it('fails when the update errors', async () => {
      const provider = createFakeProvider(
        { ...existing },
        { update: new ProviderError('Cloudflare API error: 1001: Invalid zone') }
      );

      const outcome = await handleUpdate(
        { hostname: 'test.example.com', requestedAddress: '1.2.3.4' },
        { provider, logger }
      );

      expect(outcome).toEqual({ kind: 'failed' });
      expect(provider.fetchCalls).toHaveLength(1);
      expect(provider.updateCalls).toHaveLength(1);
    });
  });
});

describe('renderOutcome', () => {
  it('renders good', () => {
    expect(renderOutcome({ kind: 'good', address: '1.2.3.4' })).toEqual({
      status: 200,
      body: 'good 1.2.3.4',
      headers: {},
    });
  });

  it('renders nochg', () => {
    expect(renderOutcome({ kind: 'nochg', address: '1.1.1.1' })).toEqual({
      status: 200,
      body: 'nochg 1.1.1.1',
      headers: {},
    });
  });

  it('renders badauth with a challenge', () => {
    expect(renderOutcome({ kind: 'rejected', reason: 'badauth' })).toEqual({
      status: 401,
      body: 'badauth',
      headers: { 'WWW-Authenticate': 'Basic realm="DynDNS"' },
    });
  });

  it('renders notfqdn and badip as 400', () => {
    expect(renderOutcome({ kind: 'rejected', reason: 'notfqdn' })).toEqual({
      status: 400,
      body: 'notfqdn',
      headers: {},
    });
    expect(renderOutcome({ kind: 'rejected', reason: 'badip' })).toEqual({
      status: 400,
      body: 'badip',
      headers: {},
    });
  });

  it('renders failures as 911 without details', () => {
    expect(renderOutcome({ kind: 'failed' })).toEqual({
      status: 500,
      body: '911',
      headers: {},
    });
  });
});

describe('handleHealth', () => {
  it('always returns OK', () => {
    expect(handleHealth()).toEqual({ status: 200, body: 'OK', headers: {} });
  });
});
