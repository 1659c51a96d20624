export type RemailerErrorCode =
  | 'UNKNOWN_REMAILER'
  | 'DUPLICATE_REMAILER'
  | 'CAPABILITY_MISMATCH'
  | 'EMPTY_CHAIN'
  | 'CHAIN_TOO_LONG'
  | 'NO_ELIGIBLE_REMAILER'
  | 'INVALID_HEADER'
  | 'INVALID_REDUNDANCY'
  | 'BACKEND_FAILURE'
  | 'ABORTED'
  | 'UNSUPPORTED_FORMAT'
  | 'MALFORMED_BLOCK'
  | 'INVALID_CONFIGURATION';

export class RemailerError extends Error {
  readonly code: RemailerErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: RemailerErrorCode, message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RemailerError';
    this.code = code;
    this.context = context;
  }
}

export function isRemailerError(error: unknown): error is RemailerError {
  return error instanceof RemailerError;
}

/**
 * Normalize anything thrown during a copy into a RemailerError.
 * Foreign errors are treated as backend failures and kept as `cause`.
 */
export function toRemailerError(error: unknown): RemailerError {
  if (isRemailerError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new RemailerError('BACKEND_FAILURE', message, undefined, { cause: error });
}
