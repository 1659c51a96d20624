/**
 * Sealed-box backend built on TweetNaCl.js
 *
 * - nacl.box (x25519-xsalsa20-poly1305) with a fresh ephemeral keypair per layer
 * - Wire layout: ephemeral public key (32) || nonce (24) || box
 * - Output is ASCII armored so it can sit inside a mail body like PGP does
 *
 * Key handles are 64-char hex Curve25519 public keys.
 */

import nacl from 'tweetnacl';
import type { EncryptionBackend } from './backend.js';

export const NACL_SCHEME = 'NaCl';

const ARMOR_BEGIN = '-----BEGIN NACL MESSAGE-----';
const ARMOR_END = '-----END NACL MESSAGE-----';
const ARMOR_LINE_LENGTH = 64;

const textEncoder = new TextEncoder();

// ============================================
// Types
// ============================================

export interface EncryptionKeypair {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
}

// ============================================
// Key Generation
// ============================================

/**
 * Generate a new Curve25519 keypair for encryption
 */
export function generateEncryptionKeypair(): EncryptionKeypair {
  const keypair = nacl.box.keyPair();
  return {
    publicKey: keypair.publicKey,
    secretKey: keypair.secretKey,
  };
}

export function uint8ArrayToHex(arr: Uint8Array): string {
  return Array.from(arr)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

export function hexToUint8Array(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error('Invalid hex string');
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = Number.parseInt(hex.substring(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Convert encryption public key to the hex key handle stored in the directory
 */
export function encryptionKeyToHex(publicKey: Uint8Array): string {
  return uint8ArrayToHex(publicKey);
}

/**
 * Convert a hex key handle back to a Curve25519 public key
 */
export function hexToEncryptionKey(hex: string): Uint8Array {
  const key = hexToUint8Array(hex);
  if (key.length !== nacl.box.publicKeyLength) {
    throw new Error(`Invalid public key length: expected ${nacl.box.publicKeyLength} bytes, got ${key.length}`);
  }
  return key;
}

// ============================================
// Sealing / Opening
// ============================================

export function sealMessage(plaintext: Uint8Array, recipientPublicKey: Uint8Array): Uint8Array {
  const ephemeral = nacl.box.keyPair();
  const nonce = nacl.randomBytes(nacl.box.nonceLength);
  const box = nacl.box(plaintext, nonce, recipientPublicKey, ephemeral.secretKey);

  const sealed = new Uint8Array(ephemeral.publicKey.length + nonce.length + box.length);
  sealed.set(ephemeral.publicKey, 0);
  sealed.set(nonce, ephemeral.publicKey.length);
  sealed.set(box, ephemeral.publicKey.length + nonce.length);
  return sealed;
}

/**
 * Open a sealed message
 *
 * @returns Plaintext, or null if the key is wrong or the data was tampered with
 */
export function openSealedMessage(sealed: Uint8Array, recipientSecretKey: Uint8Array): Uint8Array | null {
  const keyLength = nacl.box.publicKeyLength;
  const headerLength = keyLength + nacl.box.nonceLength;
  if (sealed.length < headerLength + nacl.box.overheadLength) return null;

  const ephemeralPublicKey = sealed.subarray(0, keyLength);
  const nonce = sealed.subarray(keyLength, headerLength);
  return nacl.box.open(sealed.subarray(headerLength), nonce, ephemeralPublicKey, recipientSecretKey);
}

// ============================================
// Armor
// ============================================

export function armor(data: Uint8Array): string {
  const encoded = Buffer.from(data).toString('base64');
  const lines: string[] = [];
  for (let i = 0; i < encoded.length; i += ARMOR_LINE_LENGTH) {
    lines.push(encoded.slice(i, i + ARMOR_LINE_LENGTH));
  }
  return `${ARMOR_BEGIN}\n\n${lines.join('\n')}\n${ARMOR_END}\n`;
}

/**
 * Extract the payload of the first armored block in `text`
 *
 * @returns Decoded bytes, or null when no well-formed block is present
 */
export function dearmor(text: string): Uint8Array | null {
  const start = text.indexOf(ARMOR_BEGIN);
  const end = text.indexOf(ARMOR_END);
  if (start === -1 || end === -1 || end < start) return null;

  const encoded = text.slice(start + ARMOR_BEGIN.length, end).replace(/\s+/g, '');
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded)) return null;
  return new Uint8Array(Buffer.from(encoded, 'base64'));
}

export class NaclBackend implements EncryptionBackend {
  readonly scheme = NACL_SCHEME;

  async encrypt(plaintext: Uint8Array, publicKey: string): Promise<Uint8Array> {
    const key = hexToEncryptionKey(publicKey);
    return textEncoder.encode(armor(sealMessage(plaintext, key)));
  }
}
