/**
 * CoreError: the single structured error class of the core.
 *
 * Every failure the core raises on purpose carries an {@link ErrorCode}.
 * Anything else that escapes a request is treated as an internal fault
 * and reported to the client only as a generic 500.
 */

import type { ErrorCodeValue, ErrorPayload } from '../types/errors.js';
import { ERROR_RECOVERABLE, isErrorCode } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol
// ---------------------------------------------------------------------------

/**
 * Brand used for checks across module copies and worker boundaries,
 * where `instanceof` is not reliable.
 */
const CORE_ERROR_BRAND = Symbol.for('plinth.CoreError');

// ---------------------------------------------------------------------------
// CoreError class
// ---------------------------------------------------------------------------

export interface CoreErrorOptions {
  /** Underlying error, kept for logs only. */
  cause?: unknown;
  /** Extra structured detail for logs (pattern, selector, plugin id...). */
  detail?: Record<string, unknown>;
}

export class CoreError extends Error {
  readonly code: ErrorCodeValue;
  readonly recoverable: boolean;
  readonly detail?: Record<string, unknown>;

  /** @internal */
  readonly [CORE_ERROR_BRAND] = true as const;

  constructor(code: ErrorCodeValue, message: string, options: CoreErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CoreError';
    this.code = code;
    this.recoverable = ERROR_RECOVERABLE[code];
    if (options.detail !== undefined) {
      this.detail = options.detail;
    }
  }

  toErrorPayload(): ErrorPayload {
    return { code: this.code, message: this.message };
  }

  /** Rebuild an error that crossed a thread boundary as a payload. */
  static fromPayload(payload: ErrorPayload): CoreError {
    return new CoreError(payload.code, payload.message);
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

export function isCoreError(value: unknown): value is CoreError {
  if (value instanceof CoreError) {
    return true;
  }
  return (
    typeof value === 'object' &&
    value !== null &&
    CORE_ERROR_BRAND in value &&
    value[CORE_ERROR_BRAND] === true &&
    'code' in value &&
    isErrorCode(value.code)
  );
}

/** Best-effort message text for anything thrown, including cross-realm errors. */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err) {
    return String(err.message);
  }
  return String(err);
}

/**
 * Wrap an arbitrary failure as a CoreError with `code`, keeping an
 * existing CoreError untouched.
 */
export function toCoreError(err: unknown, code: ErrorCodeValue): CoreError {
  if (isCoreError(err)) return err;
  return new CoreError(code, errorMessage(err), { cause: err });
}
