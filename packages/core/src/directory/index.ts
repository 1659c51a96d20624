export { RemailerDirectory } from './remailer-directory.js';
export type { RemailerDirectoryOptions } from './remailer-directory.js';
export { parseRemailerList, parseLatency, capabilitiesFromOptions } from './remailer-list.js';
export type { RemailerList, RemailerListing } from './remailer-list.js';
