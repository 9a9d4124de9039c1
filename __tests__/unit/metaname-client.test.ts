import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';

interface MockResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: { json: () => Promise<unknown>; text: () => Promise<string> };
}

interface RequestOptions {
  method?: string;
  body?: string;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

interface RpcRequest {
  jsonrpc: string;
  id: number;
  method: string;
  params: unknown[];
}

const mockRequest = jest.fn<(url: string, options: RequestOptions) => Promise<MockResponse>>();

jest.mock('undici', () => ({
  request: (url: string, options: RequestOptions) => mockRequest(url, options),
}));

import {
  AuthError,
  CancelledError,
  ChallengeRecordManager,
  MetanameClient,
  ProtocolError,
  TransientError,
  createCredential,
} from '../../src/index.js';
import { ACCOUNT_REFERENCE, API_KEY } from '../helpers/fake-provider.js';

function jsonResponse(statusCode: number, payload: unknown, headers: Record<string, string> = {}): MockResponse {
  return {
    statusCode,
    headers: { 'content-type': 'application/json', ...headers },
    body: {
      json: async () => payload,
      text: async () => JSON.stringify(payload),
    },
  };
}

function parseRequest(options: RequestOptions): RpcRequest {
  const parsed: RpcRequest = JSON.parse(options.body ?? '{}');
  return parsed;
}

/** Answer every call with `result`, echoing the request id */
function replyWith(result: unknown): void {
  mockRequest.mockImplementation(async (_url, options) =>
    jsonResponse(200, { jsonrpc: '2.0', id: parseRequest(options).id, result }),
  );
}

function replyWithError(error: { code: number; message: string }) {
  return async (_url: string, options: RequestOptions) =>
    jsonResponse(200, { jsonrpc: '2.0', id: parseRequest(options).id, error });
}

interface StoredRecord {
  reference: string;
  name: string;
  type: string;
  data: string;
  ttl: number;
  aux: null;
}

interface RecordParams {
  params: [string, string, string, { name: string; type: string; ttl: number; data: string } | string];
}

/**
 * Stateful stand-in for the API holding one zone, example.com. The first
 * create is committed but answered with HTTP 502.
 */
function lossyServer(stored: StoredRecord[]) {
  let creates = 0;
  return async (_url: string, options: RequestOptions): Promise<MockResponse> => {
    const { id, method } = parseRequest(options);
    const { params }: RecordParams = JSON.parse(options.body ?? '{}');
    const [, , zone, argument] = params;
    const reply = (result: unknown) => jsonResponse(200, { jsonrpc: '2.0', id, result });
    const fail = (message: string) => jsonResponse(200, { jsonrpc: '2.0', id, error: { code: -4, message } });

    if (zone !== 'example.com') {
      return fail('Invalid domain name');
    }
    if (method === 'dns_zone') {
      return reply([...stored]);
    }
    if (method === 'create_dns_record' && typeof argument === 'object') {
      creates++;
      const reference = `r${creates}`;
      stored.push({ reference, name: argument.name, type: argument.type, data: argument.data, ttl: argument.ttl, aux: null });
      return creates === 1 ? jsonResponse(502, {}) : reply(reference);
    }
    if (method === 'delete_dns_record') {
      const index = stored.findIndex((r) => r.reference === argument);
      if (index < 0) return fail('No such record');
      stored.splice(index, 1);
      return reply(null);
    }
    return fail(`unexpected ${method}`);
  };
}

function sentRequests(): RpcRequest[] {
  return mockRequest.mock.calls.map(([, options]) => parseRequest(options));
}

describe('MetanameClient', () => {
  const credential = createCredential(ACCOUNT_REFERENCE, API_KEY);
  let delays: number[];
  let client: MetanameClient;

  beforeEach(() => {
    mockRequest.mockReset();
    delays = [];
    client = new MetanameClient(credential, {
      retry: {
        sleep: async (ms: number) => {
          delays.push(ms);
        },
      },
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('creates a TXT record with the absolute name and minimum TTL', async () => {
    replyWith('rec-42');

    const reference = await client.createRecord('example.com', {
      type: 'TXT',
      name: '_acme-challenge.test.example.com',
      value: 'test_validation',
      ttl: 30,
    });

    expect(reference).toBe('rec-42');
    const [url, options] = mockRequest.mock.calls[0];
    expect(url).toBe('https://metaname.net/api/1.1');
    expect(options.method).toBe('POST');
    expect(parseRequest(options)).toEqual({
      jsonrpc: '2.0',
      id: 0,
      method: 'create_dns_record',
      params: [
        ACCOUNT_REFERENCE,
        API_KEY,
        'example.com',
        { name: '_acme-challenge.test.example.com.', type: 'TXT', aux: null, ttl: 60, data: 'test_validation' },
      ],
    });
  });

  it('sends a User-Agent header', async () => {
    replyWith([]);
    await client.listZoneRecords('example.com');
    const [, options] = mockRequest.mock.calls[0];
    expect(options.headers?.['User-Agent']).toMatch(/^acme-dns-metaname\//);
  });

  it('uses a new id per call', async () => {
    replyWith([]);
    await Promise.all([client.listZoneRecords('example.com'), client.listZoneRecords('example.org')]);
    expect(sentRequests().map((r) => r.id)).toEqual([0, 1]);
  });

  it('parses zone records', async () => {
    replyWith([
      { reference: 17, name: '_acme-challenge.example.com.', type: 'TXT', data: 'abc', ttl: 60, aux: null },
      { reference: 'r2', name: 'mail', type: 'MX', data: 'mx.example.com.', ttl: 3600, aux: 10 },
    ]);

    await expect(client.listZoneRecords('example.com')).resolves.toEqual([
      { reference: '17', name: '_acme-challenge.example.com.', type: 'TXT', data: 'abc', ttl: 60, aux: null },
      { reference: 'r2', name: 'mail', type: 'MX', data: 'mx.example.com.', ttl: 3600, aux: 10 },
    ]);
  });

  it('lists zones', async () => {
    replyWith([{ name: 'example.com' }, { name: 'example.org' }]);
    await expect(client.listZones()).resolves.toEqual([
      { name: 'example.com', providerZoneId: 'example.com' },
      { name: 'example.org', providerZoneId: 'example.org' },
    ]);
    expect(sentRequests()[0].params).toEqual([ACCOUNT_REFERENCE, API_KEY]);
  });

  it('deletes a record by reference', async () => {
    replyWith(null);
    await client.deleteRecord('example.com', 'rec-42');
    expect(sentRequests()[0]).toMatchObject({
      method: 'delete_dns_record',
      params: [ACCOUNT_REFERENCE, API_KEY, 'example.com', 'rec-42'],
    });
  });

  describe('findZone', () => {
    it('returns the zone when dns_zone answers', async () => {
      replyWith([]);
      await expect(client.findZone('example.com')).resolves.toEqual({
        name: 'example.com',
        providerZoneId: 'example.com',
      });
    });

    it('returns null for an unknown zone', async () => {
      mockRequest.mockImplementation(replyWithError({ code: -4, message: 'Invalid domain name' }));
      await expect(client.findZone('www.example.com')).resolves.toBeNull();
    });

    it('propagates auth failures', async () => {
      mockRequest.mockImplementation(replyWithError({ code: -1, message: 'Authentication failed' }));
      await expect(client.findZone('example.com')).rejects.toBeInstanceOf(AuthError);
    });
  });

  describe('errors and retries', () => {
    it('backs off about 1s then 2s when rate limited twice', async () => {
      jest.spyOn(Math, 'random').mockReturnValue(0.5);
      mockRequest
        .mockImplementationOnce(async () => jsonResponse(429, {}))
        .mockImplementationOnce(async () => jsonResponse(429, {}))
        .mockImplementationOnce(async (_url, options) =>
          jsonResponse(200, { jsonrpc: '2.0', id: parseRequest(options).id, result: 'rec-7' }),
        );

      await expect(
        client.createRecord('example.com', { type: 'TXT', name: '_acme-challenge.example.com', value: 'v' }),
      ).resolves.toBe('rec-7');
      expect(mockRequest).toHaveBeenCalledTimes(3);
      expect(delays).toEqual([1000, 2000]);
    });

    it('honours Retry-After', async () => {
      mockRequest
        .mockImplementationOnce(async () => jsonResponse(429, {}, { 'retry-after': '3' }))
        .mockImplementationOnce(async (_url, options) =>
          jsonResponse(200, { jsonrpc: '2.0', id: parseRequest(options).id, result: [] }),
        );

      await client.listZoneRecords('example.com');
      expect(delays).toEqual([3000]);
    });

    it('never retries auth errors', async () => {
      mockRequest.mockImplementation(async () => jsonResponse(401, {}));
      await expect(client.listZoneRecords('example.com')).rejects.toBeInstanceOf(AuthError);
      expect(mockRequest).toHaveBeenCalledTimes(1);
    });

    it('gives up on persistent server errors after five attempts', async () => {
      mockRequest.mockImplementation(async () => jsonResponse(503, {}));
      await expect(client.listZoneRecords('example.com')).rejects.toBeInstanceOf(TransientError);
      expect(mockRequest).toHaveBeenCalledTimes(5);
      expect(delays).toHaveLength(4);
    });

    it('retries network errors', async () => {
      mockRequest
        .mockRejectedValueOnce(Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }))
        .mockImplementationOnce(async (_url, options) =>
          jsonResponse(200, { jsonrpc: '2.0', id: parseRequest(options).id, result: [] }),
        );

      await expect(client.listZoneRecords('example.com')).resolves.toEqual([]);
      expect(mockRequest).toHaveBeenCalledTimes(2);
    });

    it('rejects a response with the wrong id', async () => {
      mockRequest.mockImplementation(async () => jsonResponse(200, { jsonrpc: '2.0', id: 99, result: [] }));
      await expect(client.listZoneRecords('example.com')).rejects.toThrow(
        'Metaname API returned out of sequence response for dns_zone: expected id 0, got 99',
      );
    });

    it('rejects a non-JSON body', async () => {
      mockRequest.mockImplementation(async () => ({
        statusCode: 200,
        headers: { 'content-type': 'text/html' },
        body: { json: async () => ({}), text: async () => '<html>maintenance</html>' },
      }));
      await expect(client.listZoneRecords('example.com')).rejects.toBeInstanceOf(ProtocolError);
    });

    it('rejects a malformed record list', async () => {
      replyWith({ records: [] });
      await expect(client.listZoneRecords('example.com')).rejects.toThrow(
        'Metaname API returned an invalid response for dns_zone: expected an array of records',
      );
    });

    it('maps an aborted request to CancelledError', async () => {
      const controller = new AbortController();
      mockRequest.mockImplementation(async () => {
        controller.abort();
        throw new Error('This operation was aborted');
      });
      await expect(
        client.listZoneRecords('example.com', { signal: controller.signal }),
      ).rejects.toBeInstanceOf(CancelledError);
      expect(mockRequest).toHaveBeenCalledTimes(1);
    });
  });

  describe('with the challenge record manager', () => {
    it('leaves no record behind when a committed create was answered with 502', async () => {
      const stored: StoredRecord[] = [];
      mockRequest.mockImplementation(lossyServer(stored));
      const manager = new ChallengeRecordManager(client);

      const record = await manager.perform('www.example.com', 'abc');
      expect(record.providerRecordId).toBe('r2');
      expect(stored.map((r) => r.reference)).toEqual(['r1', 'r2']);
      expect(delays).toHaveLength(1);

      await expect(manager.cleanup('www.example.com', 'abc')).resolves.toEqual({
        domain: 'www.example.com',
        fqdnLabel: '_acme-challenge.www.example.com',
        removed: 2,
      });
      expect(stored).toEqual([]);
    });
  });
});
