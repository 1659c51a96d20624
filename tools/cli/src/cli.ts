#!/usr/bin/env node
/**
 * Cypherpunk remailer chain builder CLI
 *
 * Usage:
 *   cypherpunk -c dizum,paranoia -t alice@example.org -s rlist.txt -k keys.json -p pubring.asc "message"
 *
 * Or via environment variables:
 *   CYPHERPUNK_STATS_FILE=rlist.txt CYPHERPUNK_KEYS_FILE=keys.json CYPHERPUNK_PUBRING_FILE=pubring.asc cypherpunk -c '*,*' -t alice@example.org < message.txt
 */

import { text } from 'node:stream/consumers';
import { runCli } from './run.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    stdout: (output) => process.stdout.write(output),
    stderr: (output) => console.error(output),
    readStdin: () => text(process.stdin),
  });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
