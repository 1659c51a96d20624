/** Everything a remailer can be asked to do as a hop. */
export const CAPABILITIES = ['middle-hop', 'final-delivery', 'latent-time', 'header-pasting'] as const;

export type Capability = (typeof CAPABILITIES)[number];

export interface RemailerStats {
  /** Average delivery latency in milliseconds */
  latencyMs: number;
  /** Reliability over the statistics window, in percent */
  uptime: number;
}

export interface RemailerRecord {
  /** Unique, compared case-insensitively */
  readonly name: string;
  /** Mail address the previous hop forwards to */
  readonly address: string;
  /** Opaque key handle, only the encryption backend interprets it */
  readonly publicKey: string;
  readonly capabilities: ReadonlySet<Capability>;
  readonly stats?: RemailerStats;
}

/** A literal remailer name or the `*` wildcard, per chain position */
export type ChainSpec = readonly string[];

/** Concrete hops, first hop (outermost layer) at index 0 */
export type ResolvedChain = readonly RemailerRecord[];

export function isCapability(value: string): value is Capability {
  return (CAPABILITIES as readonly string[]).includes(value);
}
