import type { Zone } from '../provider/types.js';

/**
 * Zone lookups for one run.
 *
 * Resolved zones are kept until the cache is discarded; there is no
 * invalidation because zone ownership does not change during an issuance.
 * Concurrent first lookups of the same key share one in-flight promise, while
 * lookups for different keys never wait on each other. Failed lookups are not
 * remembered.
 */
export class ZoneCache {
  private readonly resolved = new Map<string, Zone>();
  private readonly pending = new Map<string, Promise<Zone>>();

  get(key: string): Zone | undefined {
    return this.resolved.get(key);
  }

  /**
   * Return the cached zone for `key`, or run `lookup` once for all concurrent
   * callers asking for the same key.
   */
  async getOrLoad(key: string, lookup: () => Promise<Zone>): Promise<Zone> {
    const cached = this.resolved.get(key);
    if (cached) {
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const promise = lookup().then((zone) => {
      const frozen = Object.freeze({ ...zone });
      this.resolved.set(key, frozen);
      return frozen;
    });
    this.pending.set(key, promise);

    try {
      return await promise;
    } finally {
      if (this.pending.get(key) === promise) {
        this.pending.delete(key);
      }
    }
  }
}
