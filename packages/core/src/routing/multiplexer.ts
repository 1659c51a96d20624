import { type RandomSource, secureRandomSource } from '../crypto/index.js';
import type { EncryptionBackend } from '../crypto/index.js';
import type { RemailerDirectory } from '../directory/index.js';
import type { EnvelopeOptions } from '../envelope/index.js';
import { RemailerError, toRemailerError } from '../errors/index.js';
import { encryptChain } from '../onion/index.js';
import type { Capability, ChainSpec, CopyFailure, RouteOutcome, RoutingResult } from '../types/index.js';
import { resolveChain } from './chain-resolver.js';

export interface MultiplexerEvents {
  onCopyRouted: (result: RoutingResult) => void;
  onCopyFailed: (failure: CopyFailure) => void;
}

export interface RouteOptions extends EnvelopeOptions {
  directory: RemailerDirectory;
  backend: EncryptionBackend;
  /** Wildcard randomness (default: crypto-backed) */
  random?: RandomSource;
  maxChainLength?: number;
  signal?: AbortSignal;
  events?: Partial<MultiplexerEvents>;
}

/** A throwing handler is logged and never changes the outcome */
function notify(event: keyof MultiplexerEvents, handler: () => void): void {
  try {
    handler();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.warn(`[Multiplexer] ${event} handler failed: ${reason}`);
  }
}

type CopyAttempt = { ok: true; result: RoutingResult } | { ok: false; failure: CopyFailure };

/**
 * Build `redundancy` independently routed copies of `message`.
 *
 * Every copy draws its own wildcards and owns its chain and layers. Chains
 * are resolved in copy order before any encryption starts, so a seeded random
 * source reproduces the same chains. A failing copy never aborts its siblings:
 * the outcome lists the routed copies and one failure per copy that did not
 * make it.
 *
 * @throws RemailerError INVALID_REDUNDANCY when `redundancy` is not a positive integer
 */
export async function route(
  chainSpec: ChainSpec,
  message: string,
  redundancy: number,
  options: RouteOptions,
): Promise<RouteOutcome> {
  if (!Number.isInteger(redundancy) || redundancy < 1) {
    throw new RemailerError('INVALID_REDUNDANCY', `Redundancy must be a positive integer, got ${redundancy}`, {
      redundancy,
    });
  }

  const random = options.random ?? secureRandomSource;
  const events = options.events ?? {};
  const pasting: Capability[] = options.headers && options.headers.length > 0 ? ['header-pasting'] : [];

  const failed = (copy: number, error: unknown): CopyAttempt => {
    const failure = { copy, error: toRemailerError(error) };
    console.warn(`[Multiplexer] Copy ${copy + 1}/${redundancy} failed: [${failure.error.code}] ${failure.error.message}`);
    notify('onCopyFailed', () => events.onCopyFailed?.(failure));
    return { ok: false, failure };
  };

  // Runs synchronously up to the first backend call, so resolution order is copy order
  const routeCopy = async (copy: number): Promise<CopyAttempt> => {
    try {
      const chain = resolveChain(chainSpec, options.directory, random, {
        maxLength: options.maxChainLength,
        finalCapabilities: pasting,
      });
      const payload = await encryptChain(chain, message, options.backend, options);
      return { ok: true, result: { copy, chain, payload } };
    } catch (error) {
      return failed(copy, error);
    }
  };

  const attempts = await Promise.all(
    Array.from({ length: redundancy }, (_, copy) =>
      routeCopy(copy).then((attempt) => {
        if (attempt.ok) notify('onCopyRouted', () => events.onCopyRouted?.(attempt.result));
        return attempt;
      }),
    ),
  );

  const outcome: RouteOutcome = { results: [], failures: [] };
  for (const attempt of attempts) {
    if (attempt.ok) outcome.results.push(attempt.result);
    else outcome.failures.push(attempt.failure);
  }
  return outcome;
}
