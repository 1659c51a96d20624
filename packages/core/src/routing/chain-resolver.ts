import type { RemailerDirectory } from '../directory/index.js';
import type { RandomSource } from '../crypto/index.js';
import { RemailerError } from '../errors/index.js';
import type { Capability, ChainSpec, RemailerRecord, ResolvedChain } from '../types/index.js';

export const WILDCARD = '*';

/** Longest chain accepted by default */
export const DEFAULT_MAX_CHAIN_LENGTH = 8;

export interface ChainResolverOptions {
  maxLength?: number;
  /** Offered by the last hop on top of final-delivery, e.g. header-pasting */
  finalCapabilities?: readonly Capability[];
}

/**
 * The last hop delivers to the recipient; every other hop only forwards.
 */
export function requiredCapability(position: number, length: number): Capability {
  return position === length - 1 ? 'final-delivery' : 'middle-hop';
}

/**
 * A remailer that delivers to arbitrary addresses can also deliver to the next
 * remailer, so final-delivery satisfies a middle-hop requirement.
 */
export function acceptedCapabilities(required: Capability): Capability[] {
  return required === 'middle-hop' ? ['middle-hop', 'final-delivery'] : [required];
}

export function canServe(record: RemailerRecord, required: Capability): boolean {
  return acceptedCapabilities(required).some((capability) => record.capabilities.has(capability));
}

export function isWildcard(token: string): boolean {
  return token.trim() === WILDCARD;
}

/**
 * Resolve a chain specification into concrete remailers.
 *
 * Position 0 is the first hop, i.e. the outermost encryption layer. Wildcards
 * draw uniformly from the eligible records not yet used in this chain; when
 * that leaves nothing, repetition is allowed and logged.
 *
 * @throws RemailerError EMPTY_CHAIN, CHAIN_TOO_LONG, UNKNOWN_REMAILER,
 *   CAPABILITY_MISMATCH or NO_ELIGIBLE_REMAILER
 */
export function resolveChain(
  spec: ChainSpec,
  directory: RemailerDirectory,
  random: RandomSource,
  options: ChainResolverOptions = {},
): ResolvedChain {
  const maxLength = options.maxLength ?? DEFAULT_MAX_CHAIN_LENGTH;
  if (spec.length === 0) {
    throw new RemailerError('EMPTY_CHAIN', 'The remailer chain is empty');
  }
  if (spec.length > maxLength) {
    throw new RemailerError('CHAIN_TOO_LONG', `The remailer chain has ${spec.length} hops, at most ${maxLength} allowed`, {
      length: spec.length,
      maxLength,
    });
  }

  const chain: RemailerRecord[] = [];
  spec.forEach((token, position) => {
    const capability = requiredCapability(position, spec.length);
    const extra = position === spec.length - 1 ? (options.finalCapabilities ?? []) : [];
    chain.push(
      isWildcard(token)
        ? drawRemailer(directory, random, capability, extra, position, chain)
        : literalRemailer(directory, token, capability, extra, position),
    );
  });
  return chain;
}

function literalRemailer(
  directory: RemailerDirectory,
  name: string,
  capability: Capability,
  extra: readonly Capability[],
  position: number,
): RemailerRecord {
  const record = directory.lookup(name);
  const missing = canServe(record, capability)
    ? extra.find((wanted) => !record.capabilities.has(wanted))
    : capability;
  if (missing !== undefined) {
    throw new RemailerError(
      'CAPABILITY_MISMATCH',
      `Remailer "${record.name}" cannot be used at position ${position + 1}: it lacks ${missing}`,
      { name: record.name, position, capability: missing },
    );
  }
  return record;
}

function drawRemailer(
  directory: RemailerDirectory,
  random: RandomSource,
  capability: Capability,
  extra: readonly Capability[],
  position: number,
  chosen: readonly RemailerRecord[],
): RemailerRecord {
  const eligible = directory
    .eligible(...acceptedCapabilities(capability))
    .filter((record) => extra.every((wanted) => record.capabilities.has(wanted)));
  if (eligible.length === 0) {
    const offered = [capability, ...extra].join(' and ');
    throw new RemailerError('NO_ELIGIBLE_REMAILER', `No remailer offers ${offered} for position ${position + 1}`, {
      position,
      capability,
      required: [capability, ...extra],
    });
  }

  const unused = eligible.filter((record) => !chosen.includes(record));
  const candidates = unused.length > 0 ? unused : eligible;
  if (unused.length === 0) {
    console.warn(
      `[ChainResolver] Only ${eligible.length} remailer(s) offer ${capability}; position ${position + 1} repeats a hop`,
    );
  }

  const picked = candidates[random.nextInt(candidates.length)];
  if (!picked) {
    throw new RangeError('Random source returned an index outside the candidate list');
  }
  return picked;
}
