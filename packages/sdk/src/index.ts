export { CYPHERPUNK_VERSION } from 'cypherpunk-core';
export { CypherpunkClient } from './cypherpunk-client.js';
export type {
  CopyFailedHandler,
  CopyRoutedHandler,
  CypherpunkClientOptions,
  FileClientOptions,
  FormattedCopy,
  SendOptions,
  SendResult,
} from './cypherpunk-client.js';
export {
  BACKEND_NAMES,
  createBackend,
  isBackendName,
  loadKeyFile,
  loadRemailerList,
  parseKeyFile,
} from './config-loader.js';
export type { BackendConfig, BackendName } from './config-loader.js';
