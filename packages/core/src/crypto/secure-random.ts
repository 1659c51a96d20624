/**
 * Random sources for wildcard remailer selection.
 *
 * Selection goes through the injectable `RandomSource` so tests can swap the
 * crypto-backed generator for a fixed sequence.
 */

export interface RandomSource {
  /** Uniform integer in [0, bound) */
  nextInt(bound: number): number;
}

const UINT32_RANGE = 0x1_0000_0000;

/**
 * Generate cryptographically secure random bytes
 *
 * @param length - Number of random bytes to generate
 * @throws Error if no secure random source is available
 */
export function secureRandomBytes(length: number): Uint8Array {
  if (typeof crypto === 'undefined' || typeof crypto.getRandomValues !== 'function') {
    throw new Error('No cryptographically secure random source available');
  }
  const bytes = new Uint8Array(length);
  crypto.getRandomValues(bytes);
  return bytes;
}

function assertBound(bound: number): void {
  if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
    throw new RangeError(`Random bound must be an integer in [1, 2^32], got ${bound}`);
  }
}

/**
 * Crypto-backed source. Rejection sampling keeps the draw uniform when the
 * bound does not divide 2^32.
 */
export const secureRandomSource: RandomSource = {
  nextInt(bound: number): number {
    assertBound(bound);
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    for (;;) {
      const bytes = secureRandomBytes(4);
      const value = new DataView(bytes.buffer).getUint32(0);
      if (value < limit) return value % bound;
    }
  },
};

/**
 * Deterministic source replaying `values` in a loop, each reduced modulo the
 * requested bound.
 */
export function sequenceRandomSource(values: readonly number[]): RandomSource {
  if (values.length === 0) {
    throw new RangeError('Sequence random source needs at least one value');
  }
  let index = 0;
  return {
    nextInt(bound: number): number {
      assertBound(bound);
      const value = values[index % values.length] ?? 0;
      index++;
      return Math.abs(Math.trunc(value)) % bound;
    },
  };
}
