/** Stable status list error codes. */
export type StatusListErrorCode =
  | 'INVALID_BIT_WIDTH'
  | 'VALUE_OUT_OF_RANGE'
  | 'INDEX_OUT_OF_BOUNDS'
  | 'BUILDER_ALREADY_FINALIZED'
  | 'CORRUPT_DATA'
  | 'DECOMPRESSION_LIMIT_EXCEEDED'
  | 'MALFORMED_ENCODING';

export interface StatusListErrorOptions {
  cause?: unknown;
  context?: Record<string, string>;
}

/**
 * Error thrown by every status list operation.
 * Callers branch on `code`; the message is for humans.
 */
export class StatusListError extends Error {
  /** Machine-readable error code. */
  readonly code: StatusListErrorCode;
  /** Underlying cause, if available. */
  override readonly cause?: unknown;
  /** Offending values, for diagnostics. */
  readonly context?: Record<string, string>;

  constructor(code: StatusListErrorCode, message: string, options?: StatusListErrorOptions) {
    super(message);
    this.name = 'StatusListError';
    this.code = code;
    if (options?.cause !== undefined) this.cause = options.cause;
    if (options?.context !== undefined) this.context = options.context;
  }

  toJSON(): { name: string; code: StatusListErrorCode; message: string; context?: Record<string, string> } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.context !== undefined ? { context: this.context } : {}),
    };
  }
}

/** Type guard: checks if a value is a StatusListError, optionally with a given code. */
export function isStatusListError(
  value: unknown,
  code?: StatusListErrorCode,
): value is StatusListError {
  if (!(value instanceof StatusListError)) return false;
  return code === undefined || value.code === code;
}
