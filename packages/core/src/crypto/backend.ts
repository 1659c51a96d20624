/**
 * The one operation the onion engine needs from an asymmetric backend.
 * Any PGP implementation (or another sealing scheme) can sit behind it.
 */
export interface EncryptionBackend {
  /** Value written in the `Encrypted:` directive, e.g. `PGP` */
  readonly scheme: string;
  /** Seal `plaintext` for the holder of `publicKey`, returning armored bytes */
  encrypt(plaintext: Uint8Array, publicKey: string): Promise<Uint8Array>;
}
