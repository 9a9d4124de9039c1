/** A provider-hosted DNS zone */
export interface Zone {
  /** Zone apex, e.g. example.com */
  readonly name: string;
  /** Identifier the provider uses for the zone (the zone name on Metaname) */
  readonly providerZoneId: string;
}

/** A DNS record as returned by the provider */
export interface ProviderRecord {
  /** Provider record reference */
  reference: string;
  name: string;
  type: string;
  data: string;
  ttl?: number;
  aux?: number | null;
}

export interface CreateRecordInput {
  type?: string;
  /** Fully-qualified record name, without trailing dot */
  name: string;
  value: string;
  /** Seconds; raised to the provider minimum when lower */
  ttl?: number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * The subset of the provider API the challenge lifecycle needs.
 */
export interface DnsProviderClient {
  /** Zone named exactly `name`, or null when the account hosts no such zone */
  findZone(name: string, options?: CallOptions): Promise<Zone | null>;
  listZoneRecords(zoneId: string, options?: CallOptions): Promise<ProviderRecord[]>;
  /** Returns the provider record reference */
  createRecord(zoneId: string, record: CreateRecordInput, options?: CallOptions): Promise<string>;
  deleteRecord(zoneId: string, recordId: string, options?: CallOptions): Promise<void>;
}
