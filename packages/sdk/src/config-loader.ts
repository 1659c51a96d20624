import {
  type EncryptionBackend,
  GpgBackend,
  type GpgRunner,
  NaclBackend,
  RemailerError,
  type RemailerList,
  parseRemailerList,
} from 'cypherpunk-core';

export const BACKEND_NAMES = ['gpg', 'nacl'] as const;

export type BackendName = (typeof BACKEND_NAMES)[number];

export function isBackendName(value: string): value is BackendName {
  return (BACKEND_NAMES as readonly string[]).includes(value);
}

/**
 * Parse a key file: a JSON object mapping remailer names to key handles
 * (key IDs or fingerprints for gpg, hex public keys for NaCl).
 *
 * @throws RemailerError INVALID_CONFIGURATION when the text is not such an object
 */
export function parseKeyFile(text: string): Record<string, string> {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new RemailerError('INVALID_CONFIGURATION', 'Key file is not valid JSON', undefined, { cause: error });
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new RemailerError('INVALID_CONFIGURATION', 'Key file must map remailer names to key handles');
  }

  const keys: Record<string, string> = {};
  for (const [name, handle] of Object.entries(data)) {
    if (typeof handle !== 'string' || handle.trim() === '') {
      throw new RemailerError('INVALID_CONFIGURATION', `Key for "${name}" must be a non-empty string`, { name });
    }
    keys[name] = handle.trim();
  }
  return keys;
}

async function readConfigFile(filePath: string): Promise<string> {
  const { readFile } = await import('node:fs/promises');
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RemailerError('INVALID_CONFIGURATION', `Cannot read ${filePath}: ${reason}`, { file: filePath }, {
      cause: error,
    });
  }
}

export async function loadRemailerList(filePath: string): Promise<RemailerList> {
  return parseRemailerList(await readConfigFile(filePath));
}

export async function loadKeyFile(filePath: string): Promise<Record<string, string>> {
  return parseKeyFile(await readConfigFile(filePath));
}

export interface BackendConfig {
  /** Directory holding the gpg keyring */
  keyringDir?: string;
  /**
   * Armored remailer public keys (a `pubring.asc` export) imported into the
   * keyring before anything is encrypted. Without `keyringDir` they go into a
   * temporary keyring.
   */
  pubringFile?: string;
  /** Process runner for gpg, mainly for tests */
  runner?: GpgRunner;
}

/**
 * @throws RemailerError INVALID_CONFIGURATION for unknown backend names, for a
 * gpg backend without any source of keys and for key files gpg cannot import
 */
export async function createBackend(name: string, config: BackendConfig = {}): Promise<EncryptionBackend> {
  if (!isBackendName(name)) {
    throw new RemailerError('INVALID_CONFIGURATION', `Unknown backend "${name}"`, {
      backend: name,
      supported: [...BACKEND_NAMES],
    });
  }

  if (name === 'nacl') {
    if (config.pubringFile !== undefined) {
      throw new RemailerError('INVALID_CONFIGURATION', 'Public key files are only read by the gpg backend', {
        backend: name,
        file: config.pubringFile,
      });
    }
    return new NaclBackend();
  }

  const { keyringDir, pubringFile, runner } = config;
  if (keyringDir === undefined && pubringFile === undefined) {
    throw new RemailerError(
      'INVALID_CONFIGURATION',
      'The gpg backend needs remailer keys: give a keyring directory or a public key file',
      { backend: name },
    );
  }

  let backend: GpgBackend;
  if (keyringDir === undefined) {
    backend = await GpgBackend.withTemporaryKeyring({ runner });
  } else {
    const { join } = await import('node:path');
    backend = new GpgBackend({ keyring: join(keyringDir, 'keyring.gpg'), runner });
  }

  if (pubringFile !== undefined) {
    const armored = await readConfigFile(pubringFile);
    try {
      await backend.importKeys(armored);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RemailerError('INVALID_CONFIGURATION', `Cannot import keys from ${pubringFile}: ${reason}`, {
        file: pubringFile,
      }, { cause: error });
    }
  }
  return backend;
}
