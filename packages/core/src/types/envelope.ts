import type { RemailerError } from '../errors/index.js';
import type { RemailerRecord, ResolvedChain } from './remailer.js';

export interface Header {
  name: string;
  value: string;
}

/**
 * The cleartext block a single hop decrypts.
 *
 * `routingHeaders` follow `Anon-To` in the `::` section and are only ever
 * directives the decrypting remailer understands. `pastedHeaders` form the `##`
 * section and exist on the final hop only.
 */
export interface Envelope {
  recipientDirective: string;
  routingHeaders: Header[];
  pastedHeaders: Header[];
  body: string;
}

export interface EncryptedLayer {
  /** Armored ciphertext as produced by the backend */
  ciphertext: Uint8Array;
  /** The hop whose key sealed this layer */
  target: RemailerRecord;
  /** Value of the `Encrypted:` directive, e.g. `PGP` */
  scheme: string;
}

/** What the sender hands to the first hop */
export interface OuterMessage {
  /** First hop's address */
  to: string;
  /** Plaintext `::` directives preceding the ciphertext */
  headers: Header[];
  ciphertext: string;
}

export interface RoutingResult {
  /** Zero-based generation index of this redundancy copy */
  copy: number;
  chain: ResolvedChain;
  payload: OuterMessage;
}

export interface CopyFailure {
  copy: number;
  error: RemailerError;
}

export interface RouteOutcome {
  results: RoutingResult[];
  failures: CopyFailure[];
}
