export { encryptChain } from './onion-engine.js';
export type { EncryptChainOptions } from './onion-engine.js';
