/**
 * Challenge Record Manager
 *
 * Owns the lifecycle of every `_acme-challenge` TXT record of a run:
 * resolve the zone, create (or adopt) the record, optionally wait until the
 * provider lists it, and remove it again on cleanup.
 */

import {
  CancelledError,
  ValidationError,
  isAuthError,
  isNotFoundError,
  toErrorSummary,
  type ErrorSummary,
} from '../errors/challenge-errors.js';
import {
  CHALLENGE_STATE,
  canTransition,
  type ChallengeState,
} from '../constants/status.js';
import {
  METANAME_MIN_TTL_SECONDS,
  PROPAGATION_ATTEMPTS,
  PROPAGATION_INTERVAL_MS,
  TXT_RECORD_TYPE,
} from '../constants/defaults.js';
import { challengeRecordName, normalizeDomain, recordNameMatches } from '../utils/domain.js';
import { debugChallenge } from '../utils/debug.js';
import { abortable, sleep as defaultSleep, type SleepFunction } from '../transport/retry.js';
import { ZoneResolver } from '../zones/zone-resolver.js';
import type { DnsProviderClient, ProviderRecord, Zone } from '../provider/types.js';
import { logWarn } from '../../logger.js';

/** Snapshot of one challenge record */
export interface ChallengeRecord {
  /** Normalized domain being validated */
  readonly domain: string;
  /** `_acme-challenge.<domain>` */
  readonly fqdnLabel: string;
  /** Validation string supplied by the host */
  readonly value: string;
  readonly zone: Zone;
  readonly providerRecordId?: string;
  readonly state: ChallengeState;
}

interface TrackedRecord {
  domain: string;
  fqdnLabel: string;
  value: string;
  zone: Zone;
  providerRecordId?: string;
  state: ChallengeState;
}

/**
 * Optional poll of the provider's own API after a write. Disabled by default:
 * with `attempts: 0` perform() returns right after the create call.
 */
export interface PropagationOptions {
  attempts: number;
  intervalMs: number;
}

export interface ChallengeRecordManagerOptions {
  resolver?: ZoneResolver;
  propagation?: Partial<PropagationOptions>;
  /** TTL of created records in seconds */
  ttl?: number;
  sleep?: SleepFunction;
}

export interface PerformOptions {
  signal?: AbortSignal;
}

export interface CleanupResult {
  domain: string;
  fqdnLabel: string;
  /** Number of records deleted (or found already gone) */
  removed: number;
  /** Set when removal failed; cleanup never throws */
  error?: ErrorSummary;
}

const VALUE_PATTERN = /^[\x21-\x7e]{1,255}$/;

function recordKey(fqdnLabel: string, value: string): string {
  return JSON.stringify([fqdnLabel, value]);
}

function snapshot(record: TrackedRecord): ChallengeRecord {
  return Object.freeze({ ...record });
}

export class ChallengeRecordManager {
  readonly resolver: ZoneResolver;
  private readonly propagation: PropagationOptions;
  private readonly ttl: number;
  private readonly sleep: SleepFunction;
  private readonly tracked = new Map<string, TrackedRecord>();
  private readonly performing = new Map<string, Promise<ChallengeRecord>>();
  private readonly cleaning = new Map<string, Promise<CleanupResult>>();
  private readonly removedKeys = new Set<string>();

  constructor(
    private readonly client: DnsProviderClient,
    options: ChallengeRecordManagerOptions = {},
  ) {
    this.resolver = options.resolver ?? new ZoneResolver(client);
    this.propagation = {
      attempts: options.propagation?.attempts ?? PROPAGATION_ATTEMPTS,
      intervalMs: options.propagation?.intervalMs ?? PROPAGATION_INTERVAL_MS,
    };
    this.ttl = options.ttl ?? METANAME_MIN_TTL_SECONDS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Provision the TXT record for a challenge and return once it is active.
   *
   * Re-running perform for a pair that is already active returns the existing
   * record; concurrent calls for the same pair share one creation.
   */
  async perform(domain: string, value: string, options: PerformOptions = {}): Promise<ChallengeRecord> {
    const normalized = normalizeDomain(domain);
    if (!VALUE_PATTERN.test(value)) {
      throw ValidationError.invalidValue(
        normalized,
        'expected 1-255 printable ASCII characters without spaces',
      );
    }
    const fqdnLabel = challengeRecordName(normalized);
    const key = recordKey(fqdnLabel, value);

    // A record being removed must not be reported active
    const removing = this.cleaning.get(key);
    if (removing) {
      debugChallenge('%s: waiting for in-flight cleanup', fqdnLabel);
      await abortable(removing, options.signal, `perform ${fqdnLabel}`);
    }

    const existing = this.tracked.get(key);
    if (existing?.state === CHALLENGE_STATE.ACTIVE) {
      debugChallenge('%s already active (record %s)', fqdnLabel, existing.providerRecordId);
      return snapshot(existing);
    }

    const inFlight = this.performing.get(key);
    if (inFlight) {
      debugChallenge('%s: joining in-flight perform', fqdnLabel);
      try {
        return await abortable(inFlight, options.signal, `perform ${fqdnLabel}`);
      } catch (error) {
        // Cancelled by the caller that started it; this caller still wants the record
        if (error instanceof CancelledError && !options.signal?.aborted) {
          return this.perform(domain, value, options);
        }
        throw error;
      }
    }

    const promise = this.doPerform(normalized, fqdnLabel, value, key, options.signal);
    this.performing.set(key, promise);
    try {
      return await promise;
    } finally {
      if (this.performing.get(key) === promise) {
        this.performing.delete(key);
      }
    }
  }

  private async doPerform(
    domain: string,
    fqdnLabel: string,
    value: string,
    key: string,
    signal?: AbortSignal,
  ): Promise<ChallengeRecord> {
    this.removedKeys.delete(key);

    // A cancelled earlier perform may have left a committed record behind
    let record = this.tracked.get(key);
    if (!record || record.state === CHALLENGE_STATE.FAILED) {
      const zone = await this.resolver.resolve(domain, { signal });
      record = { domain, fqdnLabel, value, zone, state: CHALLENGE_STATE.PENDING };
      await this.createOrAdopt(record, key, signal);
    } else {
      debugChallenge('%s: resuming record %s in state %s', fqdnLabel, record.providerRecordId, record.state);
    }

    if (signal?.aborted) {
      // The record is committed and tracked, so cleanup can still remove it
      throw CancelledError.fromSignal(signal, `perform ${fqdnLabel}`);
    }

    await this.waitForProviderListing(record, signal);

    this.transition(record, CHALLENGE_STATE.ACTIVE);
    return snapshot(record);
  }

  private async createOrAdopt(record: TrackedRecord, key: string, signal?: AbortSignal): Promise<void> {
    const { zone, fqdnLabel, value } = record;
    try {
      const existing = this.findMatching(
        await this.client.listZoneRecords(zone.providerZoneId, { signal }),
        record,
      );

      if (existing.length > 0) {
        record.providerRecordId = existing[0].reference;
        debugChallenge('%s: adopting existing record %s', fqdnLabel, record.providerRecordId);
      } else {
        if (signal?.aborted) {
          throw CancelledError.fromSignal(signal, `perform ${fqdnLabel}`);
        }
        record.providerRecordId = await this.client.createRecord(
          zone.providerZoneId,
          { type: TXT_RECORD_TYPE, name: fqdnLabel, value, ttl: this.ttl },
          { signal },
        );
        debugChallenge('%s: created record %s in zone %s', fqdnLabel, record.providerRecordId, zone.name);
      }
    } catch (error) {
      this.transition(record, CHALLENGE_STATE.FAILED);
      debugChallenge('%s: create failed: %s', fqdnLabel, toErrorSummary(error).message);
      throw error;
    }

    this.transition(record, CHALLENGE_STATE.CREATED);
    this.tracked.set(key, record);
  }

  private async waitForProviderListing(record: TrackedRecord, signal?: AbortSignal): Promise<void> {
    if (record.state === CHALLENGE_STATE.CREATED) {
      this.transition(record, CHALLENGE_STATE.PROPAGATION_WAIT);
    }

    const { attempts, intervalMs } = this.propagation;
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const records = await this.client.listZoneRecords(record.zone.providerZoneId, { signal });
        if (records.some((r) => r.reference === record.providerRecordId)) {
          debugChallenge('%s: provider lists record after %d poll(s)', record.fqdnLabel, attempt);
          return;
        }
      } catch (error) {
        if (isAuthError(error)) {
          this.transition(record, CHALLENGE_STATE.FAILED);
          throw error;
        }
        if (error instanceof CancelledError) {
          throw error;
        }
        logWarn(`Polling ${record.zone.name} for ${record.fqdnLabel} failed: ${toErrorSummary(error).message}`);
        return;
      }

      if (attempt < attempts) {
        await this.sleep(intervalMs, signal);
      }
    }

    if (attempts > 0) {
      logWarn(
        `Record ${record.fqdnLabel} not listed by the provider after ${attempts} poll(s); continuing`,
      );
    }
  }

  /**
   * Remove the TXT record of a challenge. Never throws: failures are logged
   * and reported in the result.
   */
  async cleanup(domain: string, value: string): Promise<CleanupResult> {
    let normalized: string;
    try {
      normalized = normalizeDomain(domain);
    } catch (error) {
      return this.cleanupFailed(domain, domain, error);
    }
    const fqdnLabel = challengeRecordName(normalized);
    const key = recordKey(fqdnLabel, value);

    // Concurrent cleanups of one pair run one after the other
    const previous = this.cleaning.get(key);
    if (previous) {
      await previous;
      return this.cleanup(domain, value);
    }

    const promise = this.doCleanup(normalized, fqdnLabel, value, key);
    this.cleaning.set(key, promise);
    try {
      return await promise;
    } finally {
      if (this.cleaning.get(key) === promise) {
        this.cleaning.delete(key);
      }
    }
  }

  private async doCleanup(domain: string, fqdnLabel: string, value: string, key: string): Promise<CleanupResult> {
    try {
      // Let a concurrent perform settle so a late commit is not orphaned
      const inFlight = this.performing.get(key);
      if (inFlight) {
        await inFlight.then(
          () => undefined,
          () => undefined,
        );
      }

      if (this.removedKeys.has(key)) {
        debugChallenge('%s: already cleaned up', fqdnLabel);
        return { domain, fqdnLabel, removed: 0 };
      }

      let removed = 0;
      let zone: Zone;
      const tracked = this.tracked.get(key);
      if (tracked?.providerRecordId) {
        await this.deleteIgnoringNotFound(tracked.zone, tracked.providerRecordId, fqdnLabel);
        removed++;
        zone = tracked.zone;
      } else {
        zone = await this.resolver.resolve(domain);
      }

      // Also catches duplicates committed by a create whose answer was lost and retried
      removed += await this.removeMatching(zone, fqdnLabel, value, tracked?.providerRecordId);

      if (tracked) {
        this.transition(tracked, CHALLENGE_STATE.REMOVED);
      }
      this.tracked.delete(key);
      this.removedKeys.add(key);
      return { domain, fqdnLabel, removed };
    } catch (error) {
      return this.cleanupFailed(domain, fqdnLabel, error);
    }
  }

  private cleanupFailed(domain: string, fqdnLabel: string, error: unknown): CleanupResult {
    const summary = toErrorSummary(error);
    logWarn(`Unable to delete the challenge record ${fqdnLabel}: ${summary.message}`);
    return { domain, fqdnLabel, removed: 0, error: summary };
  }

  private async removeMatching(
    zone: Zone,
    fqdnLabel: string,
    value: string,
    alreadyDeleted?: string,
  ): Promise<number> {
    const matches = this.findMatching(await this.client.listZoneRecords(zone.providerZoneId), {
      zone,
      fqdnLabel,
      value,
    }).filter((r) => r.reference !== alreadyDeleted);
    debugChallenge('%s: %d matching record(s) to remove', fqdnLabel, matches.length);

    let removed = 0;
    let firstError: unknown;
    for (const match of matches) {
      try {
        await this.deleteIgnoringNotFound(zone, match.reference, fqdnLabel);
        removed++;
      } catch (error) {
        if (firstError === undefined) firstError = error;
      }
    }
    if (firstError !== undefined) {
      throw firstError;
    }
    return removed;
  }

  private async deleteIgnoringNotFound(zone: Zone, recordId: string, fqdnLabel: string): Promise<void> {
    try {
      await this.client.deleteRecord(zone.providerZoneId, recordId);
      debugChallenge('%s: deleted record %s', fqdnLabel, recordId);
    } catch (error) {
      if (isNotFoundError(error)) {
        debugChallenge('%s: record %s already gone', fqdnLabel, recordId);
        return;
      }
      throw error;
    }
  }

  private findMatching(
    records: ProviderRecord[],
    target: Pick<TrackedRecord, 'zone' | 'fqdnLabel' | 'value'>,
  ): ProviderRecord[] {
    return records.filter(
      (r) =>
        r.type.toUpperCase() === TXT_RECORD_TYPE &&
        r.data === target.value &&
        recordNameMatches(r.name, target.fqdnLabel, target.zone.name),
    );
  }

  private transition(record: TrackedRecord, to: ChallengeState): void {
    if (record.state === to) return;
    if (!canTransition(record.state, to)) {
      throw new Error(`Illegal challenge state transition ${record.state} -> ${to} for ${record.fqdnLabel}`);
    }
    debugChallenge('%s: %s -> %s', record.fqdnLabel, record.state, to);
    record.state = to;
  }

  /** Snapshot of the records this manager currently tracks */
  records(): ChallengeRecord[] {
    return Array.from(this.tracked.values(), snapshot);
  }
}
