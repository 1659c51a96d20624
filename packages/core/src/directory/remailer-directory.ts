import { RemailerError } from '../errors/index.js';
import type { Capability, RemailerRecord } from '../types/index.js';
import { type RemailerListing, capabilitiesFromOptions } from './remailer-list.js';

export interface RemailerDirectoryOptions {
  /** Wildcards skip remailers whose known uptime (percent) is below this */
  minUptime?: number;
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Read-only set of known remailers, keyed by case-insensitive name.
 * Safe to share between any number of concurrent resolutions.
 */
export class RemailerDirectory {
  private byName = new Map<string, RemailerRecord>();
  private minUptime: number;

  constructor(records: Iterable<RemailerRecord>, options: RemailerDirectoryOptions = {}) {
    this.minUptime = options.minUptime ?? 0;
    for (const record of records) {
      const key = normalizeName(record.name);
      if (this.byName.has(key)) {
        throw new RemailerError('DUPLICATE_REMAILER', `Remailer "${record.name}" is listed twice`, {
          name: record.name,
        });
      }
      this.byName.set(
        key,
        Object.freeze({
          ...record,
          capabilities: new Set(record.capabilities),
          stats: record.stats ? Object.freeze({ ...record.stats }) : undefined,
        }),
      );
    }
  }

  /**
   * Build a directory from parsed statistics and a `name -> key handle` map.
   * Listings without a key cannot be encrypted to and are left out.
   */
  static fromListing(
    listings: readonly RemailerListing[],
    keys: Readonly<Record<string, string>> | ReadonlyMap<string, string>,
    options: RemailerDirectoryOptions = {},
  ): RemailerDirectory {
    const keyByName = new Map<string, string>();
    const entries = keys instanceof Map ? keys.entries() : Object.entries(keys);
    for (const [name, key] of entries) {
      keyByName.set(normalizeName(name), key);
    }

    const records: RemailerRecord[] = [];
    for (const listing of listings) {
      const publicKey = keyByName.get(normalizeName(listing.name));
      if (!publicKey) {
        console.warn(`[RemailerDirectory] No key for ${listing.name}, skipping`);
        continue;
      }
      records.push({
        name: listing.name,
        address: listing.address,
        publicKey,
        capabilities: capabilitiesFromOptions(listing.options),
        stats:
          listing.latencyMs !== undefined && listing.uptime !== undefined
            ? { latencyMs: listing.latencyMs, uptime: listing.uptime }
            : undefined,
      });
    }
    return new RemailerDirectory(records, options);
  }

  find(name: string): RemailerRecord | undefined {
    return this.byName.get(normalizeName(name));
  }

  lookup(name: string): RemailerRecord {
    const record = this.find(name);
    if (!record) {
      throw new RemailerError('UNKNOWN_REMAILER', `Unknown remailer "${name}"`, { name });
    }
    return record;
  }

  /**
   * Records holding any of `capabilities`, in insertion order.
   * The order carries no meaning for selection.
   */
  eligible(...capabilities: Capability[]): RemailerRecord[] {
    return Array.from(this.byName.values()).filter(
      (record) =>
        capabilities.some((capability) => record.capabilities.has(capability)) &&
        (record.stats === undefined || record.stats.uptime >= this.minUptime),
    );
  }

  records(): RemailerRecord[] {
    return Array.from(this.byName.values());
  }

  size(): number {
    return this.byName.size;
  }
}
