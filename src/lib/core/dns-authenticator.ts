/**
 * Host-facing dns-01 authenticator
 *
 * A plain perform/cleanup capability any host adapter (certbot hooks, an ACME
 * client's setDns/cleanup callbacks) can bind to. Every domain of a batch is
 * handled independently: one failure never aborts or delays its siblings.
 */

import {
  AggregateChallengeError,
  toErrorSummary,
  type ErrorSummary,
} from '../errors/challenge-errors.js';
import { MetanameClient, type MetanameClientOptions } from '../provider/metaname-client.js';
import { ZoneCache } from '../zones/zone-cache.js';
import { ZoneResolver } from '../zones/zone-resolver.js';
import { debugChallenge } from '../utils/debug.js';
import type { MetanameConfig } from '../config/config.js';
import {
  ChallengeRecordManager,
  type ChallengeRecord,
  type ChallengeRecordManagerOptions,
  type PerformOptions,
} from './challenge-record-manager.js';

/** One domain to validate and its validation string (base64url SHA-256 digest) */
export interface ChallengeRequest {
  domain: string;
  validation: string;
}

export type PerformOutcome =
  | { domain: string; ok: true; record: ChallengeRecord }
  | { domain: string; ok: false; error: ErrorSummary };

export interface CleanupOutcome {
  domain: string;
  ok: boolean;
  removed: number;
  error?: ErrorSummary;
}

export class DnsAuthenticator {
  constructor(readonly manager: ChallengeRecordManager) {}

  /**
   * Wire a provider client, zone cache and record manager for one run.
   */
  static fromConfig(
    config: MetanameConfig,
    options: Omit<ChallengeRecordManagerOptions, 'resolver' | 'propagation'> & {
      client?: Omit<MetanameClientOptions, 'endpoint' | 'retry'>;
    } = {},
  ): DnsAuthenticator {
    const { client: clientOptions, ...managerOptions } = options;
    const client = new MetanameClient(config.credential, {
      ...clientOptions,
      endpoint: config.endpoint,
      retry: config.retry,
    });
    const resolver = new ZoneResolver(client, new ZoneCache());
    return new DnsAuthenticator(
      new ChallengeRecordManager(client, {
        ...managerOptions,
        resolver,
        propagation: config.propagation,
      }),
    );
  }

  async perform(challenges: ChallengeRequest[], options: PerformOptions = {}): Promise<PerformOutcome[]> {
    debugChallenge('perform batch of %d domain(s)', challenges.length);
    return Promise.all(
      challenges.map(async ({ domain, validation }): Promise<PerformOutcome> => {
        try {
          const record = await this.manager.perform(domain, validation, options);
          return { domain, ok: true, record };
        } catch (error) {
          return { domain, ok: false, error: toErrorSummary(error) };
        }
      }),
    );
  }

  /** Best effort for every entry; never throws. */
  async cleanup(challenges: ChallengeRequest[]): Promise<CleanupOutcome[]> {
    debugChallenge('cleanup batch of %d domain(s)', challenges.length);
    return Promise.all(
      challenges.map(async ({ domain, validation }): Promise<CleanupOutcome> => {
        const result = await this.manager.cleanup(domain, validation);
        return result.error
          ? { domain, ok: false, removed: result.removed, error: result.error }
          : { domain, ok: true, removed: result.removed };
      }),
    );
  }

  /**
   * Throw an AggregateChallengeError naming every failed domain.
   */
  static assertAllSucceeded(outcomes: PerformOutcome[]): void {
    const failures = outcomes.flatMap((outcome) =>
      outcome.ok ? [] : [{ domain: outcome.domain, ...outcome.error }],
    );
    if (failures.length > 0) {
      throw new AggregateChallengeError(failures);
    }
  }
}
