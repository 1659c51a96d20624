export { CAPABILITIES, isCapability } from './remailer.js';
export type { Capability, ChainSpec, RemailerRecord, RemailerStats, ResolvedChain } from './remailer.js';
export type {
  CopyFailure,
  EncryptedLayer,
  Envelope,
  Header,
  OuterMessage,
  RouteOutcome,
  RoutingResult,
} from './envelope.js';
