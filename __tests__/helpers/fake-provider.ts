import type {
  CallOptions,
  CreateRecordInput,
  DnsProviderClient,
  ProviderRecord,
  Zone,
} from '../../src/index.js';
import { NotFoundError } from '../../src/index.js';

export type FakeMethod = 'findZone' | 'listZoneRecords' | 'createRecord' | 'deleteRecord';

export interface FakeCall {
  method: FakeMethod;
  args: unknown[];
}

interface Failure {
  method: FakeMethod;
  error: unknown;
  remaining: number;
  when?: (args: unknown[]) => boolean;
}

export const ACCOUNT_REFERENCE = 'abcd';
export const API_KEY = 'test-api-key'.padEnd(48, 'x');

/**
 * In-process stand-in for the Metaname API: a set of hosted zones with their
 * records, a call log and scripted failures.
 */
export class FakeDnsProvider implements DnsProviderClient {
  readonly calls: FakeCall[] = [];
  private readonly zones = new Map<string, ProviderRecord[]>();
  private readonly failures: Failure[] = [];
  private nextId: number;

  /** Runs inside createRecord before the record is committed */
  beforeCreate?: (zoneId: string, record: CreateRecordInput) => Promise<void> | void;
  /** Filters what listZoneRecords returns (simulates a lagging API) */
  listFilter?: (records: ProviderRecord[]) => ProviderRecord[];

  constructor(zoneNames: string[], options: { firstRecordId?: number } = {}) {
    for (const name of zoneNames) {
      this.zones.set(name, []);
    }
    this.nextId = options.firstRecordId ?? 1;
  }

  failOn(
    method: FakeMethod,
    error: unknown,
    options: { times?: number; when?: (args: unknown[]) => boolean } = {},
  ): void {
    this.failures.push({ method, error, remaining: options.times ?? 1, when: options.when });
  }

  seed(zoneId: string, record: Omit<ProviderRecord, 'reference'> & { reference?: string }): string {
    const reference = record.reference ?? `rec-${this.nextId++}`;
    this.zoneRecords(zoneId).push({ ...record, reference });
    return reference;
  }

  recordsIn(zoneId: string): ProviderRecord[] {
    return [...this.zoneRecords(zoneId)];
  }

  callsOf(method: FakeMethod): unknown[][] {
    return this.calls.filter((c) => c.method === method).map((c) => c.args);
  }

  async findZone(name: string, _options?: CallOptions): Promise<Zone | null> {
    this.enter('findZone', [name]);
    return this.zones.has(name) ? { name, providerZoneId: name } : null;
  }

  async listZoneRecords(zoneId: string, _options?: CallOptions): Promise<ProviderRecord[]> {
    this.enter('listZoneRecords', [zoneId]);
    const records = this.recordsIn(zoneId);
    return this.listFilter ? this.listFilter(records) : records;
  }

  async createRecord(zoneId: string, record: CreateRecordInput, _options?: CallOptions): Promise<string> {
    this.enter('createRecord', [zoneId, record]);
    if (this.beforeCreate) {
      await this.beforeCreate(zoneId, record);
    }
    return this.seed(zoneId, {
      name: record.name,
      type: record.type ?? 'TXT',
      data: record.value,
      ttl: record.ttl,
      aux: null,
    });
  }

  async deleteRecord(zoneId: string, recordId: string, _options?: CallOptions): Promise<void> {
    this.enter('deleteRecord', [zoneId, recordId]);
    const records = this.zoneRecords(zoneId);
    const index = records.findIndex((r) => r.reference === recordId);
    if (index < 0) {
      throw NotFoundError.fromRpc('delete_dns_record', `No such record ${recordId}`);
    }
    records.splice(index, 1);
  }

  private zoneRecords(zoneId: string): ProviderRecord[] {
    const records = this.zones.get(zoneId);
    if (!records) {
      throw NotFoundError.fromRpc('dns_zone', `No such zone ${zoneId}`);
    }
    return records;
  }

  private enter(method: FakeMethod, args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.failures.find(
      (f) => f.method === method && f.remaining > 0 && (!f.when || f.when(args)),
    );
    if (failure) {
      failure.remaining--;
      throw failure.error;
    }
  }
}

/** A promise with its resolve/reject exposed */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
