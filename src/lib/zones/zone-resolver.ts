import { CancelledError, ZoneNotFoundError } from '../errors/challenge-errors.js';
import { abortable } from '../transport/retry.js';
import { normalizeDomain, zoneNameCandidates } from '../utils/domain.js';
import { debugZone } from '../utils/debug.js';
import type { CallOptions, DnsProviderClient, Zone } from '../provider/types.js';
import { ZoneCache } from './zone-cache.js';

/**
 * Maps a domain to the provider-hosted zone that controls it.
 *
 * The provider has no "which zone owns this name" call, so candidates are
 * tried from the full name towards the second-level domain and the first one
 * the account hosts wins.
 */
export class ZoneResolver {
  constructor(
    private readonly client: Pick<DnsProviderClient, 'findZone'>,
    readonly cache: ZoneCache = new ZoneCache(),
  ) {}

  async resolve(domain: string, options: CallOptions = {}): Promise<Zone> {
    const normalized = normalizeDomain(domain);
    try {
      return await abortable(
        this.cache.getOrLoad(normalized, () => this.lookup(normalized, options)),
        options.signal,
        `resolve ${normalized}`,
      );
    } catch (error) {
      // A joined lookup was cancelled by the caller that started it
      if (error instanceof CancelledError && !options.signal?.aborted) {
        debugZone('shared lookup of %s was cancelled, resolving again', normalized);
        return this.resolve(domain, options);
      }
      throw error;
    }
  }

  private async lookup(domain: string, options: CallOptions): Promise<Zone> {
    const candidates = zoneNameCandidates(domain);
    debugZone('resolving %s, candidates=%j', domain, candidates);

    for (const candidate of candidates) {
      const zone = await this.client.findZone(candidate, options);
      if (zone) {
        debugZone('resolved %s to zone %s', domain, zone.name);
        return zone;
      }
    }

    debugZone('no zone found for %s', domain);
    throw ZoneNotFoundError.forDomain(domain, candidates);
  }
}
