import {
  type ChainSpec,
  type CopyFailure,
  type EncryptionBackend,
  type Header,
  OUTPUT_FORMATS,
  type OutputFormat,
  type RandomSource,
  RemailerDirectory,
  RemailerError,
  type RemailerListing,
  type RouteOutcome,
  type RoutingResult,
  fileNameFor,
  formatResult,
  isOutputFormat,
  parseHeader,
  route,
} from 'cypherpunk-core';
import { loadKeyFile, loadRemailerList } from './config-loader.js';

interface ClientSettings {
  backend: EncryptionBackend;
  maxChainLength?: number;
  /** Wildcard randomness (default: crypto-backed) */
  random?: RandomSource;
}

interface ListingSource {
  listing: readonly RemailerListing[];
  /** `name -> key handle`; listings without a key are skipped */
  keys: Readonly<Record<string, string>>;
  /** Wildcards skip remailers whose uptime (percent) is below this */
  minUptime?: number;
}

export type CypherpunkClientOptions = ClientSettings & ({ directory: RemailerDirectory } | ListingSource);

export interface FileClientOptions extends ClientSettings {
  statsFile: string;
  keysFile: string;
  minUptime?: number;
}

export interface SendOptions {
  /** End recipient address */
  recipient: string;
  /** Headers pasted into the delivered mail, as objects or `"Name: value"` lines */
  headers?: ReadonlyArray<Header | string>;
  latency?: string;
  /** Number of independently routed copies (default: 1) */
  redundancy?: number;
  /** `native`, `mailto` or `eml` (default: `native`) */
  format?: string;
  /** Subject of the mail to the first hop (mailto and eml only) */
  subject?: string;
  signal?: AbortSignal;
}

export interface FormattedCopy {
  copy: number;
  /** Remailer names, first hop first */
  chain: string[];
  fileName: string;
  text: string;
}

export interface SendResult {
  format: OutputFormat;
  copies: FormattedCopy[];
  failures: CopyFailure[];
}

export type CopyRoutedHandler = (result: RoutingResult) => void;
export type CopyFailedHandler = (failure: CopyFailure) => void;

export class CypherpunkClient {
  private directory: RemailerDirectory;
  private backend: EncryptionBackend;
  private maxChainLength?: number;
  private random?: RandomSource;

  private copyRoutedHandlers: CopyRoutedHandler[] = [];
  private copyFailedHandlers: CopyFailedHandler[] = [];

  constructor(options: CypherpunkClientOptions) {
    this.backend = options.backend;
    this.maxChainLength = options.maxChainLength;
    this.random = options.random;
    this.directory =
      'directory' in options
        ? options.directory
        : RemailerDirectory.fromListing(options.listing, options.keys, { minUptime: options.minUptime });
  }

  /**
   * Load the remailer statistics (`rlist.txt` format) and the key file from disk.
   */
  static async fromFiles(options: FileClientOptions): Promise<CypherpunkClient> {
    const [list, keys] = await Promise.all([loadRemailerList(options.statsFile), loadKeyFile(options.keysFile)]);
    return new CypherpunkClient({
      backend: options.backend,
      maxChainLength: options.maxChainLength,
      random: options.random,
      listing: list.remailers,
      keys,
      minUptime: options.minUptime,
    });
  }

  getDirectory(): RemailerDirectory {
    return this.directory;
  }

  /**
   * Route `message` through `chainSpec` and render every copy that made it.
   *
   * Options are checked before anything is encrypted; per-copy failures are
   * returned alongside the rendered copies.
   */
  async send(chainSpec: ChainSpec, message: string, options: SendOptions): Promise<SendResult> {
    const format = options.format ?? 'native';
    if (!isOutputFormat(format)) {
      throw new RemailerError('UNSUPPORTED_FORMAT', `Unsupported output format "${format}"`, {
        format,
        supported: [...OUTPUT_FORMATS],
      });
    }

    const headers = (options.headers ?? []).map((header) =>
      typeof header === 'string' ? parseHeader(header) : header,
    );

    const outcome: RouteOutcome = await route(chainSpec, message, options.redundancy ?? 1, {
      directory: this.directory,
      backend: this.backend,
      random: this.random,
      maxChainLength: this.maxChainLength,
      signal: options.signal,
      recipient: options.recipient,
      headers,
      latency: options.latency,
      events: {
        onCopyRouted: (result) => {
          for (const handler of this.copyRoutedHandlers) handler(result);
        },
        onCopyFailed: (failure) => {
          for (const handler of this.copyFailedHandlers) handler(failure);
        },
      },
    });

    return {
      format,
      copies: outcome.results.map((result) => ({
        copy: result.copy,
        chain: result.chain.map((hop) => hop.name),
        fileName: fileNameFor(result, format),
        text: formatResult(result, format, { subject: options.subject }),
      })),
      failures: outcome.failures,
    };
  }

  onCopyRouted(handler: CopyRoutedHandler): void {
    this.copyRoutedHandlers.push(handler);
  }

  onCopyFailed(handler: CopyFailedHandler): void {
    this.copyFailedHandlers.push(handler);
  }
}
