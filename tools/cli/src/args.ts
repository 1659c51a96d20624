import { OUTPUT_FORMATS, type OutputFormat, RemailerError, isOutputFormat } from 'cypherpunk-core';
import { BACKEND_NAMES, type BackendName, isBackendName } from 'cypherpunk-sdk';

export interface CliOptions {
  chain: string[];
  redundancy: number;
  /** Recipient headers as `"Name: value"` lines */
  headers: string[];
  recipient?: string;
  format: OutputFormat;
  statsFile?: string;
  keysFile?: string;
  outputDir?: string;
  latency?: string;
  backend: BackendName;
  keyringDir?: string;
  /** Armored remailer public keys imported before encrypting */
  pubringFile?: string;
  minUptime?: number;
  /** Positional message; read from stdin when absent */
  message?: string;
  help: boolean;
}

export type CliEnv = Readonly<Record<string, string | undefined>>;

export const HELP_TEXT = `
Cypherpunk remailer chain builder

Usage: cypherpunk [options] [message]

Options:
  -c, --chain <names>       Remailers, first hop first, separated by commas or spaces;
                            "*" picks a random one (repeatable)
  -r, --redundancy <n>      Independently routed copies (default: 1)
  -H, --header <line>       Header pasted into the delivered mail, "Name: value" (repeatable)
  -t, --to <address>        Final recipient
  -f, --format <format>     native, mailto or eml (default: native)
  -m, --mailto-link         Same as --format mailto
  -s, --stats <file>        Remailer statistics in rlist.txt format
  -k, --keys <file>         JSON file mapping remailer names to key handles
  -o, --output <dir>        Write message-<n> files instead of printing
  -l, --latency <+h:mm>     Latent-Time for remailers that support it
  --backend <name>          gpg or nacl (default: gpg)
  --keyring <dir>           Directory of the gpg keyring
  -p, --pubring <file>      Armored remailer public keys (pubring.asc) to import;
                            gpg needs --keyring, --pubring or both
  --min-uptime <percent>    Skip less reliable remailers when picking at random
  -h, --help                Show this help message

Environment variables:
  CYPHERPUNK_STATS_FILE     Remailer statistics file
  CYPHERPUNK_KEYS_FILE      Key file
  CYPHERPUNK_BACKEND        Encryption backend
  CYPHERPUNK_KEYRING_DIR    gpg keyring directory
  CYPHERPUNK_PUBRING_FILE   Remailer public key file

Example:
  cypherpunk -p pubring.asc -c dizum,* -t alice@example.org -H "Subject: hello" "Meet at noon."
`;

function invalid(message: string, context?: Record<string, unknown>): RemailerError {
  return new RemailerError('INVALID_CONFIGURATION', message, context);
}

function fromEnv(env: CliEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Parse command-line arguments. Flags win over environment variables.
 *
 * @throws RemailerError for unknown options, missing values and values out of range
 */
export function parseArgs(args: readonly string[], env: CliEnv = {}): CliOptions {
  const chain: string[] = [];
  const headers: string[] = [];
  const positional: string[] = [];
  let redundancy = 1;
  let format: OutputFormat = 'native';
  let recipient: string | undefined;
  let statsFile = fromEnv(env, 'CYPHERPUNK_STATS_FILE');
  let keysFile = fromEnv(env, 'CYPHERPUNK_KEYS_FILE');
  let backend = fromEnv(env, 'CYPHERPUNK_BACKEND') ?? 'gpg';
  let keyringDir = fromEnv(env, 'CYPHERPUNK_KEYRING_DIR');
  let pubringFile = fromEnv(env, 'CYPHERPUNK_PUBRING_FILE');
  let outputDir: string | undefined;
  let latency: string | undefined;
  let minUptime: number | undefined;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const value = (): string => {
      const next = args[i + 1];
      if (next === undefined) {
        throw invalid(`Option ${arg} needs a value`, { option: arg });
      }
      i++;
      return next;
    };

    switch (arg) {
      case '-c':
      case '--chain':
        chain.push(...value().split(/[\s,]+/).filter((name) => name !== ''));
        break;
      case '-r':
      case '--redundancy': {
        const raw = value();
        if (!/^\d+$/.test(raw)) {
          throw new RemailerError('INVALID_REDUNDANCY', `Redundancy must be a positive integer, got "${raw}"`, {
            redundancy: raw,
          });
        }
        redundancy = Number(raw);
        break;
      }
      case '-H':
      case '--header':
        headers.push(value());
        break;
      case '-t':
      case '--to':
        recipient = value();
        break;
      case '-f':
      case '--format': {
        const kind = value();
        if (!isOutputFormat(kind)) {
          throw new RemailerError('UNSUPPORTED_FORMAT', `Unsupported output format "${kind}"`, {
            format: kind,
            supported: [...OUTPUT_FORMATS],
          });
        }
        format = kind;
        break;
      }
      case '-m':
      case '--mailto-link':
        format = 'mailto';
        break;
      case '-s':
      case '--stats':
        statsFile = value();
        break;
      case '-k':
      case '--keys':
        keysFile = value();
        break;
      case '-o':
      case '--output':
        outputDir = value();
        break;
      case '-l':
      case '--latency':
        latency = value();
        break;
      case '--backend':
        backend = value();
        break;
      case '--keyring':
        keyringDir = value();
        break;
      case '-p':
      case '--pubring':
        pubringFile = value();
        break;
      case '--min-uptime': {
        const raw = value();
        const percent = Number(raw);
        if (raw.trim() === '' || !Number.isFinite(percent) || percent < 0 || percent > 100) {
          throw invalid(`Minimum uptime must be a percentage between 0 and 100, got "${raw}"`, { minUptime: raw });
        }
        minUptime = percent;
        break;
      }
      case '-h':
      case '--help':
        help = true;
        break;
      case '--':
        positional.push(...args.slice(i + 1));
        i = args.length;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw invalid(`Unknown option "${arg}"`, { option: arg });
        }
        positional.push(arg);
    }
  }

  if (!isBackendName(backend)) {
    throw invalid(`Unknown backend "${backend}"`, { backend, supported: [...BACKEND_NAMES] });
  }

  return {
    chain,
    redundancy,
    headers,
    recipient,
    format,
    statsFile,
    keysFile,
    outputDir,
    latency,
    backend,
    keyringDir,
    pubringFile,
    minUptime,
    message: positional.length > 0 ? positional.join(' ') : undefined,
    help,
  };
}
