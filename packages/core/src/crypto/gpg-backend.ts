/**
 * PGP backend driving the `gpg` command line against a private keyring.
 *
 * Plaintext goes in on stdin and armored ciphertext comes back on stdout, so
 * nothing is written to disk except the keyring itself.
 */

import { spawn } from 'node:child_process';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { EncryptionBackend } from './backend.js';

export const PGP_SCHEME = 'PGP';

const KEY_BLOCK_PATTERN = /-----BEGIN PGP PUBLIC KEY BLOCK-----[\s\S]*?-----END PGP PUBLIC KEY BLOCK-----/g;

/**
 * Split a keyring export such as a remailer `pubring.asc` into its armored key blocks.
 */
export function splitKeyBlocks(armored: string): string[] {
  return [...armored.matchAll(KEY_BLOCK_PATTERN)].map((match) => `${match[0]}\n`);
}

export interface GpgRunResult {
  /** Exit code, null when the process was killed by a signal */
  code: number | null;
  stdout: Uint8Array;
  stderr: string;
}

export type GpgRunner = (command: string, args: readonly string[], input: Uint8Array) => Promise<GpgRunResult>;

export interface GpgBackendOptions {
  /** Keyring file holding the remailer keys */
  keyring: string;
  /** gpg executable (default: `gpg`) */
  command?: string;
  quiet?: boolean;
  runner?: GpgRunner;
}

export const spawnGpg: GpgRunner = (command, args, input) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], { stdio: ['pipe', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    child.on('error', reject);
    // gpg may exit before reading all of its input; its exit code says why
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') reject(error);
    });
    child.on('close', (code) => {
      resolve({
        code,
        stdout: new Uint8Array(Buffer.concat(stdout)),
        stderr: Buffer.concat(stderr).toString('utf-8'),
      });
    });

    child.stdin.end(input);
  });

export class GpgBackend implements EncryptionBackend {
  readonly scheme = PGP_SCHEME;
  private keyring: string;
  private command: string;
  private quiet: boolean;
  private runner: GpgRunner;

  constructor(options: GpgBackendOptions) {
    this.keyring = options.keyring;
    this.command = options.command ?? 'gpg';
    this.quiet = options.quiet ?? true;
    this.runner = options.runner ?? spawnGpg;
  }

  /**
   * Create a backend whose keyring lives in a fresh temporary directory.
   */
  static async withTemporaryKeyring(options: Omit<GpgBackendOptions, 'keyring'> = {}): Promise<GpgBackend> {
    const dir = await mkdtemp(join(tmpdir(), 'cypherpunk-'));
    return new GpgBackend({ ...options, keyring: join(dir, 'keyring.gpg') });
  }

  getKeyring(): string {
    return this.keyring;
  }

  async importKey(armoredKey: string): Promise<void> {
    await this.run(['--import'], new TextEncoder().encode(armoredKey), 'Key import');
  }

  /**
   * Import every public key block found in `armored`, one gpg run per block.
   * Returns the number of blocks imported.
   */
  async importKeys(armored: string): Promise<number> {
    const blocks = splitKeyBlocks(armored);
    if (blocks.length === 0) {
      throw new Error('Key import failed: no PGP public key block found');
    }
    for (const block of blocks) {
      await this.importKey(block);
    }
    return blocks.length;
  }

  /**
   * Encrypt to a hidden recipient so the ciphertext does not name the hop's key.
   * `publicKey` is anything gpg accepts as a recipient: key ID, fingerprint or address.
   */
  async encrypt(plaintext: Uint8Array, publicKey: string): Promise<Uint8Array> {
    return this.run(['--trust-model', 'always', '--armor', '--hidden-recipient', publicKey, '--encrypt'], plaintext, 'Encryption');
  }

  private async run(operation: string[], input: Uint8Array, label: string): Promise<Uint8Array> {
    const args = ['--batch', '--no-default-keyring', '--keyring', this.keyring];
    if (this.quiet) args.push('--quiet');
    args.push(...operation);

    const result = await this.runner(this.command, args, input);
    if (result.code === null) {
      throw new Error(`${label} failed: gpg exited without an exit code`);
    }
    if (result.code !== 0) {
      const detail = result.stderr.trim();
      throw new Error(`${label} failed: gpg exited with code ${result.code}${detail ? `\n${detail}` : ''}`);
    }
    return result.stdout;
  }
}
