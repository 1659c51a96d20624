export { RemailerError, isRemailerError, toRemailerError } from './remailer-error.js';
export type { RemailerErrorCode } from './remailer-error.js';
