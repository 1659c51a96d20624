import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { sequenceRandomSource } from '../crypto/index.js';
import { RemailerDirectory } from '../directory/index.js';
import { FakeBackend, openTestBlock } from '../testing/fake-backend.js';
import type { Capability, RemailerRecord } from '../types/index.js';
import { route } from './multiplexer.js';

function makeRemailer(name: string, capabilities: Capability[] = ['middle-hop', 'final-delivery']): RemailerRecord {
  return { name, address: `remailer@${name}.example`, publicKey: `key-${name}`, capabilities: new Set(capabilities) };
}

describe('route', () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const directory = new RemailerDirectory(['a', 'b', 'c'].map((name) => makeRemailer(name)));

  it('produces one result per copy when nothing fails', async () => {
    const outcome = await route(['*', '*'], 'hello', 3, {
      directory,
      backend: new FakeBackend(),
      recipient: 'alice@example.org',
    });

    expect(outcome.failures).toEqual([]);
    expect(outcome.results.map((r) => r.copy)).toEqual([0, 1, 2]);
    for (const result of outcome.results) {
      expect(result.chain).toHaveLength(2);
      expect(result.payload.to).toBe(result.chain[0]?.address);
    }
  });

  it('draws wildcards independently per copy, in copy order', async () => {
    // copy 0: [a,b,c][0] = a, then [b,c][1] = c; copy 1: [a,b,c][2] = c, then [a,b][0] = a
    const outcome = await route(['*', '*'], 'hello', 2, {
      directory,
      backend: new FakeBackend(),
      random: sequenceRandomSource([0, 1, 2, 0]),
      recipient: 'alice@example.org',
    });

    expect(outcome.results.map((r) => r.chain.map((hop) => hop.name))).toEqual([
      ['a', 'c'],
      ['c', 'a'],
    ]);
  });

  it('gives every copy its own chain and payload', async () => {
    const outcome = await route(['a', 'b'], 'hello', 2, {
      directory,
      backend: new FakeBackend(),
      recipient: 'alice@example.org',
    });
    const [first, second] = outcome.results;

    expect(first?.chain).not.toBe(second?.chain);
    expect(first?.payload).not.toBe(second?.payload);
    expect(first?.payload).toEqual(second?.payload);
  });

  it('reports failed copies without dropping the others', async () => {
    const onCopyFailed = vi.fn();
    const onCopyRouted = vi.fn();
    const outcome = await route(['*'], 'hello', 3, {
      directory: new RemailerDirectory([makeRemailer('a'), makeRemailer('b')]),
      backend: new FakeBackend({ failFor: ['key-b'] }),
      random: sequenceRandomSource([0, 1, 0]),
      recipient: 'alice@example.org',
      events: { onCopyFailed, onCopyRouted },
    });

    expect(outcome.results.map((r) => r.copy)).toEqual([0, 2]);
    expect(outcome.failures).toHaveLength(1);
    expect(outcome.failures[0]?.copy).toBe(1);
    expect(outcome.failures[0]?.error).toMatchObject({ code: 'BACKEND_FAILURE', context: { hop: 'b' } });
    expect(onCopyRouted).toHaveBeenCalledTimes(2);
    expect(onCopyFailed).toHaveBeenCalledWith(outcome.failures[0]);
    expect(warn).toHaveBeenCalledWith(
      '[Multiplexer] Copy 2/3 failed: [BACKEND_FAILURE] Encryption to b failed: no public key for key-b',
    );
  });

  it('keeps every copy when an event handler throws', async () => {
    const onCopyRouted = vi.fn((): void => {
      throw new Error('handler exploded');
    });
    const onCopyFailed = vi.fn((): void => {
      throw 'not an error';
    });
    const outcome = await route(['*'], 'hello', 3, {
      directory: new RemailerDirectory([makeRemailer('a'), makeRemailer('b')]),
      backend: new FakeBackend({ failFor: ['key-b'] }),
      random: sequenceRandomSource([0, 1, 0]),
      recipient: 'alice@example.org',
      events: { onCopyRouted, onCopyFailed },
    });

    expect(outcome.results.map((r) => r.copy)).toEqual([0, 2]);
    expect(outcome.failures.map((f) => f.copy)).toEqual([1]);
    expect(onCopyRouted).toHaveBeenCalledTimes(2);
    expect(onCopyFailed).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[Multiplexer] onCopyRouted handler failed: handler exploded');
    expect(warn).toHaveBeenCalledWith('[Multiplexer] onCopyFailed handler failed: not an error');
  });

  it('only lets final hops that paste headers deliver a copy with headers', async () => {
    const outcome = await route(['*', '*'], 'hello', 1, {
      directory: new RemailerDirectory([
        makeRemailer('a'),
        makeRemailer('b'),
        makeRemailer('paster', ['middle-hop', 'final-delivery', 'header-pasting']),
      ]),
      backend: new FakeBackend(),
      // the last position draws from [paster] only
      random: sequenceRandomSource([0, 0]),
      recipient: 'alice@example.org',
      headers: [{ name: 'Subject', value: 'plans' }],
    });

    expect(outcome.results.map((r) => r.chain.map((hop) => hop.name))).toEqual([['a', 'paster']]);
    const [result] = outcome.results;
    const forPaster = openTestBlock(result?.payload.ciphertext ?? '', 'key-a') ?? '';
    expect(openTestBlock(forPaster, 'key-paster')).toBe('::\nAnon-To: alice@example.org\n\n##\nSubject: plans\n\nhello');
  });

  it('reports resolution errors per copy', async () => {
    const outcome = await route(['unknownname'], 'hello', 2, {
      directory,
      backend: new FakeBackend(),
      recipient: 'alice@example.org',
    });

    expect(outcome.results).toEqual([]);
    expect(outcome.failures.map((f) => [f.copy, f.error.code])).toEqual([
      [0, 'UNKNOWN_REMAILER'],
      [1, 'UNKNOWN_REMAILER'],
    ]);
  });

  it('wraps foreign backend throws as backend failures', async () => {
    const backend = {
      scheme: 'TEST',
      encrypt: vi.fn(async (): Promise<Uint8Array> => {
        throw 'keyring locked';
      }),
    };
    const outcome = await route(['a'], 'hello', 1, { directory, backend, recipient: 'alice@example.org' });
    expect(outcome.failures[0]?.error).toMatchObject({
      code: 'BACKEND_FAILURE',
      message: 'Encryption to a failed: keyring locked',
    });
  });

  it('rejects redundancy below one or non-integer', async () => {
    const options = { directory, backend: new FakeBackend(), recipient: 'alice@example.org' };
    await expect(route(['a'], 'hello', 0, options)).rejects.toMatchObject({ code: 'INVALID_REDUNDANCY' });
    await expect(route(['a'], 'hello', 1.5, options)).rejects.toMatchObject({ code: 'INVALID_REDUNDANCY' });
  });

  it('keeps completed copies when aborted mid-way', async () => {
    let releaseGate = (): void => {};
    const gate = new Promise<void>((resolve) => {
      releaseGate = resolve;
    });
    class GatedBackend extends FakeBackend {
      override async encrypt(plaintext: Uint8Array, publicKey: string): Promise<Uint8Array> {
        if (publicKey === 'key-slow') await gate;
        return super.encrypt(plaintext, publicKey);
      }
    }

    const controller = new AbortController();
    const outcome = await route(['*', '*'], 'hello', 2, {
      directory: new RemailerDirectory([
        makeRemailer('middle', ['middle-hop']),
        makeRemailer('fast', ['final-delivery']),
        makeRemailer('slow', ['final-delivery']),
      ]),
      backend: new GatedBackend(),
      // copy 0: middle -> fast, copy 1: middle -> slow
      random: sequenceRandomSource([0, 0, 0, 1]),
      recipient: 'alice@example.org',
      signal: controller.signal,
      events: {
        onCopyRouted: () => {
          controller.abort();
          releaseGate();
        },
      },
    });

    expect(outcome.results.map((r) => r.chain.map((hop) => hop.name))).toEqual([['middle', 'fast']]);
    expect(openTestBlock(outcome.results[0]?.payload.ciphertext ?? '', 'key-middle')).not.toBeNull();
    expect(outcome.failures.map((f) => [f.copy, f.error.code])).toEqual([[1, 'ABORTED']]);
  });
});
