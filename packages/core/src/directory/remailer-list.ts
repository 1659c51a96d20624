/**
 * Parser for the published remailer statistics (`rlist.txt`).
 *
 * Two kinds of lines matter:
 * - capability lines: `$remailer{"dizum"} = "<remailer@dizum.com> cpunk max pgp hash latent";`
 * - statistics rows: `dizum  remailer@dizum.com  ***+**+*****  1:03:21  99.97%`
 *
 * Fetching the file is the caller's business.
 */

import type { Capability } from '../types/index.js';

export interface RemailerListing {
  name: string;
  address: string;
  /** Raw option words from the capability line */
  options: string[];
  latencyMs?: number;
  uptime?: number;
}

export interface RemailerList {
  /** Value of the `Last update:` line, when present */
  lastUpdate?: string;
  remailers: RemailerListing[];
}

const CAPABILITY_LINE = /^\$remailer\{"([a-z0-9]+)"\}\s*=\s*"<([^>\s]+)>((?:\s+[a-z0-9]+)*)\s*";/;
const LAST_UPDATE_LINE = /^Last update:\s+(.+?)\s*$/;
const STATS_ROW = /^([a-z0-9]+)\s+(\S+@\S+)\s+[*?+\-#._ ]*?(\d[\d:]*)\s+(\d{1,3}(?:\.\d+)?)%/;
const LATENCY = /^(?:(\d+):)?([0-5]?\d):([0-5]\d)$/;

/**
 * Convert an `[h:]mm:ss` latency to milliseconds
 *
 * @returns Milliseconds, or null when the string is not a latency
 */
export function parseLatency(latency: string): number | null {
  const match = LATENCY.exec(latency.trim());
  if (!match) return null;
  const hours = match[1] ? Number.parseInt(match[1], 10) : 0;
  const minutes = Number.parseInt(match[2] ?? '0', 10);
  const seconds = Number.parseInt(match[3] ?? '0', 10);
  return ((hours * 60 + minutes) * 60 + seconds) * 1000;
}

/**
 * Map rlist option words to hop capabilities.
 * Only `cpunk` remailers take Type I messages at all; `middle` marks
 * middleman remailers that never deliver to the final recipient.
 */
export function capabilitiesFromOptions(options: readonly string[]): Set<Capability> {
  const capabilities = new Set<Capability>();
  if (!options.includes('cpunk')) return capabilities;

  capabilities.add('middle-hop');
  if (!options.includes('middle')) capabilities.add('final-delivery');
  if (options.includes('latent')) capabilities.add('latent-time');
  if (options.includes('hash')) capabilities.add('header-pasting');
  return capabilities;
}

export function parseRemailerList(text: string): RemailerList {
  const listings = new Map<string, RemailerListing>();
  const list: RemailerList = { remailers: [] };

  const upsert = (name: string, address: string): RemailerListing => {
    let listing = listings.get(name);
    if (!listing) {
      listing = { name, address, options: [] };
      listings.set(name, listing);
    }
    return listing;
  };

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();

    const capability = CAPABILITY_LINE.exec(line);
    if (capability) {
      const [, name = '', address = '', options = ''] = capability;
      const listing = upsert(name, address);
      listing.address = address;
      listing.options = options.split(/\s+/).filter((word) => word.length > 0);
      continue;
    }

    const update = LAST_UPDATE_LINE.exec(line);
    if (update) {
      list.lastUpdate = update[1];
      continue;
    }

    const row = STATS_ROW.exec(line);
    if (row) {
      const [, name = '', address = '', latency = '', uptime = ''] = row;
      const listing = upsert(name, address);
      const latencyMs = parseLatency(latency);
      if (latencyMs === null) {
        console.warn(`[RemailerList] Unreadable latency "${latency}" for ${name}, using 0`);
      }
      listing.latencyMs = latencyMs ?? 0;
      listing.uptime = Number.parseFloat(uptime);
    }
  }

  list.remailers = Array.from(listings.values());
  return list;
}
