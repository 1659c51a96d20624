export {
  DEFAULT_MAX_CHAIN_LENGTH,
  WILDCARD,
  acceptedCapabilities,
  canServe,
  isWildcard,
  requiredCapability,
  resolveChain,
} from './chain-resolver.js';
export type { ChainResolverOptions } from './chain-resolver.js';
export { route } from './multiplexer.js';
export type { MultiplexerEvents, RouteOptions } from './multiplexer.js';
