export { HELP_TEXT, parseArgs } from './args.js';
export type { CliEnv, CliOptions } from './args.js';
export { EXIT_FAILURE, EXIT_OK, EXIT_PARTIAL, formatError, runCli } from './run.js';
export type { CliIo } from './run.js';
