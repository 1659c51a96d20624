import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type EncryptionBackend, type RandomSource, RemailerError, isRemailerError } from 'cypherpunk-core';
import { type BackendConfig, type BackendName, CypherpunkClient, createBackend } from 'cypherpunk-sdk';
import { type CliEnv, HELP_TEXT, parseArgs } from './args.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** Some copies were written, others failed */
export const EXIT_PARTIAL = 2;

export interface CliIo {
  env: CliEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  createBackend?: (name: BackendName, config: BackendConfig) => Promise<EncryptionBackend>;
  random?: RandomSource;
}

export function formatError(error: unknown): string {
  if (isRemailerError(error)) return `Error [${error.code}]: ${error.message}`;
  if (error instanceof Error) return `Error: ${error.message}`;
  return `Error: ${String(error)}`;
}

function required(value: string | undefined, message: string): string {
  if (value === undefined) {
    throw new RemailerError('INVALID_CONFIGURATION', message);
  }
  return value;
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Run the command line and return its exit code. Nothing here throws:
 * errors are reported on stderr.
 */
export async function runCli(args: readonly string[], io: CliIo): Promise<number> {
  try {
    const options = parseArgs(args, io.env);
    if (options.help) {
      io.stderr(HELP_TEXT);
      return EXIT_OK;
    }

    const recipient = required(options.recipient, 'Missing recipient: pass -t/--to <address>');
    const statsFile = required(
      options.statsFile,
      'Missing remailer statistics: pass -s/--stats <file> or set CYPHERPUNK_STATS_FILE',
    );
    const keysFile = required(options.keysFile, 'Missing key file: pass -k/--keys <file> or set CYPHERPUNK_KEYS_FILE');

    const message = options.message ?? (await io.readStdin());
    if (message === '') {
      throw new RemailerError('INVALID_CONFIGURATION', 'No message given: pass it as an argument or on stdin');
    }

    const backend = await (io.createBackend ?? createBackend)(options.backend, {
      keyringDir: options.keyringDir,
      pubringFile: options.pubringFile,
    });
    const client = await CypherpunkClient.fromFiles({
      backend,
      statsFile,
      keysFile,
      minUptime: options.minUptime,
      random: io.random,
    });

    const sent = await client.send(options.chain, message, {
      recipient,
      headers: options.headers,
      latency: options.latency,
      redundancy: options.redundancy,
      format: options.format,
    });

    if (options.outputDir !== undefined) {
      await mkdir(options.outputDir, { recursive: true });
      for (const copy of sent.copies) {
        const filePath = join(options.outputDir, copy.fileName);
        await writeFile(filePath, withNewline(copy.text), 'utf-8');
        io.stderr(`[Cli] Wrote ${filePath} (${copy.chain.join(' -> ')})`);
      }
    } else {
      for (const copy of sent.copies) {
        io.stdout(withNewline(copy.text));
      }
    }

    const [firstFailure] = sent.failures;
    if (!firstFailure) return EXIT_OK;
    if (sent.copies.length > 0) return EXIT_PARTIAL;
    io.stderr(formatError(firstFailure.error));
    return EXIT_FAILURE;
  } catch (error) {
    io.stderr(formatError(error));
    return EXIT_FAILURE;
  }
}
