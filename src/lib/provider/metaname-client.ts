/**
 * Metaname JSON-RPC API client
 *
 * Documented at https://metaname.net/api/1.1/doc. Every call is a JSON-RPC 2.0
 * POST whose params start with the account reference and API key.
 */

import {
  CancelledError,
  NotFoundError,
  ProtocolError,
  ValidationError,
  type DnsChallengeError,
} from '../errors/challenge-errors.js';
import {
  createErrorFromHttpStatus,
  createErrorFromNetworkError,
  createErrorFromRpcError,
} from '../errors/factory.js';
import {
  METANAME_API_ENDPOINT,
  METANAME_MIN_TTL_SECONDS,
  TXT_RECORD_TYPE,
} from '../constants/defaults.js';
import {
  HttpClient,
  type HttpClientOptions,
  type ParsedResponseData,
} from '../transport/http-client.js';
import { withRetry, type RetryConfig } from '../transport/retry.js';
import { debugRpc } from '../utils/debug.js';
import type { Credential } from '../config/credentials.js';
import type {
  CallOptions,
  CreateRecordInput,
  DnsProviderClient,
  ProviderRecord,
  Zone,
} from './types.js';

export interface MetanameClientOptions {
  /** API endpoint (default: https://metaname.net/api/1.1) */
  endpoint?: string;
  retry?: Partial<RetryConfig>;
  http?: HttpClientOptions;
}

type ResultParser<T> = (result: unknown, method: string) => T;

export class MetanameClient implements DnsProviderClient {
  readonly endpoint: string;
  private readonly http: HttpClient;
  private readonly retry: Partial<RetryConfig>;
  private requestId = 0;

  constructor(
    private readonly credential: Credential,
    options: MetanameClientOptions = {},
  ) {
    this.endpoint = options.endpoint ?? METANAME_API_ENDPOINT;
    this.retry = options.retry ?? {};
    this.http = new HttpClient(options.http);
  }

  /**
   * Make a request to the API, retrying transient failures and rate limits.
   * Returns the parsed `result` member.
   */
  async request<T>(
    method: string,
    params: unknown[],
    parse: ResultParser<T>,
    options: CallOptions = {},
  ): Promise<T> {
    const result = await withRetry(
      () => this.call(method, params, options.signal),
      this.retry,
      method,
      options.signal,
    );
    return parse(result, method);
  }

  private async call(method: string, params: unknown[], signal?: AbortSignal): Promise<unknown> {
    const id = this.requestId++;
    const payload = {
      jsonrpc: '2.0',
      id,
      method,
      params: [this.credential.accountReference, this.credential.apiKey, ...params],
    };
    debugRpc('-> %s id=%d params=%j', method, id, params);

    let response: ParsedResponseData;
    try {
      response = await this.http.postJson(this.endpoint, payload, { signal });
    } catch (error) {
      if (signal?.aborted) {
        throw CancelledError.fromSignal(signal, method);
      }
      throw createErrorFromNetworkError(method, error);
    }

    const httpError = createErrorFromHttpStatus(method, response.statusCode, response.headers);
    if (httpError) {
      throw httpError;
    }

    const body = response.body;
    if (!body || typeof body !== 'object') {
      throw ProtocolError.notJson(method);
    }
    if (!('id' in body) || body.id !== id) {
      throw ProtocolError.outOfSequence(method, id, 'id' in body ? body.id : undefined);
    }
    if ('error' in body && body.error !== undefined && body.error !== null) {
      const error: DnsChallengeError = createErrorFromRpcError(method, body.error);
      debugRpc('<- %s id=%d error kind=%s message=%s', method, id, error.kind, error.message);
      throw error;
    }
    if (!('result' in body)) {
      throw ProtocolError.invalidResponse(method, 'neither result nor error present');
    }

    debugRpc('<- %s id=%d ok', method, id);
    return body.result;
  }

  async findZone(name: string, options: CallOptions = {}): Promise<Zone | null> {
    try {
      await this.request('dns_zone', [name], parseRecordList, options);
      return { name, providerZoneId: name };
    } catch (error) {
      // Unknown zones come back as an invalid-domain or not-found answer
      if (error instanceof NotFoundError || error instanceof ValidationError) {
        debugRpc('zone %s is not hosted: %s', name, error.message);
        return null;
      }
      throw error;
    }
  }

  async listZones(options: CallOptions = {}): Promise<Zone[]> {
    return this.request('dns_zones', [], parseZoneList, options);
  }

  async listZoneRecords(zoneId: string, options: CallOptions = {}): Promise<ProviderRecord[]> {
    return this.request('dns_zone', [zoneId], parseRecordList, options);
  }

  async createRecord(
    zoneId: string,
    record: CreateRecordInput,
    options: CallOptions = {},
  ): Promise<string> {
    const ttl = Math.max(record.ttl ?? METANAME_MIN_TTL_SECONDS, METANAME_MIN_TTL_SECONDS);
    return this.request(
      'create_dns_record',
      [
        zoneId,
        {
          name: `${record.name}.`,
          type: record.type ?? TXT_RECORD_TYPE,
          aux: null,
          ttl,
          data: record.value,
        },
      ],
      parseReference,
      options,
    );
  }

  async deleteRecord(zoneId: string, recordId: string, options: CallOptions = {}): Promise<void> {
    await this.request('delete_dns_record', [zoneId, recordId], () => undefined, options);
  }
}

function parseReference(result: unknown, method: string): string {
  if (typeof result === 'string' && result.length > 0) {
    return result;
  }
  if (typeof result === 'number') {
    return String(result);
  }
  throw ProtocolError.invalidResponse(method, `expected a record reference, got ${JSON.stringify(result)}`);
}

function parseRecordList(result: unknown, method: string): ProviderRecord[] {
  if (!Array.isArray(result)) {
    throw ProtocolError.invalidResponse(method, 'expected an array of records');
  }
  return result.map((entry: unknown) => parseRecord(entry, method));
}

function parseRecord(entry: unknown, method: string): ProviderRecord {
  if (!entry || typeof entry !== 'object') {
    throw ProtocolError.invalidResponse(method, `malformed record ${JSON.stringify(entry)}`);
  }
  const reference = 'reference' in entry ? entry.reference : undefined;
  const name = 'name' in entry ? entry.name : undefined;
  const type = 'type' in entry ? entry.type : undefined;
  const data = 'data' in entry ? entry.data : undefined;
  if (
    (typeof reference !== 'string' && typeof reference !== 'number') ||
    typeof name !== 'string' ||
    typeof type !== 'string' ||
    typeof data !== 'string'
  ) {
    throw ProtocolError.invalidResponse(method, `malformed record ${JSON.stringify(entry)}`);
  }
  const ttl = 'ttl' in entry && typeof entry.ttl === 'number' ? entry.ttl : undefined;
  const aux = 'aux' in entry && typeof entry.aux === 'number' ? entry.aux : null;
  return { reference: String(reference), name, type, data, ttl, aux };
}

function parseZoneList(result: unknown, method: string): Zone[] {
  if (!Array.isArray(result)) {
    throw ProtocolError.invalidResponse(method, 'expected an array of zones');
  }
  return result.map((entry: unknown) => {
    const name = entry && typeof entry === 'object' && 'name' in entry ? entry.name : undefined;
    if (typeof name !== 'string') {
      throw ProtocolError.invalidResponse(method, `malformed zone ${JSON.stringify(entry)}`);
    }
    return { name, providerZoneId: name };
  });
}
