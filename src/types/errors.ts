/**
 * Error codes for the request-processing core.
 *
 * Codes group into the scripting layer, the patch applicator, the body
 * render pipeline, internal faults, startup and the resolver. Recoverable
 * codes are handled where they arise (a dropped header, an empty content
 * lookup, a breaker charge); everything else surfaces as a 500 or aborts
 * startup.
 */

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

export const ErrorCode = {
  // scripting
  EVAL_ERROR: 'EVAL_ERROR',
  CALL_ERROR: 'CALL_ERROR',
  CONVERSION: 'CONVERSION',
  // patch applicator
  INVALID_HEADER_VALUE: 'INVALID_HEADER_VALUE',
  // render pipeline
  INVALID_REGEX: 'INVALID_REGEX',
  HTML_REWRITE: 'HTML_REWRITE',
  JSON_AFTER_REGEX: 'JSON_AFTER_REGEX',
  JSON_PATCH: 'JSON_PATCH',
  TEMPLATE: 'TEMPLATE',
  IO: 'IO',
  // internal
  MISSING_CONTEXT: 'MISSING_CONTEXT',
  MISSING_BODY: 'MISSING_BODY',
  INVALID_STATUS: 'INVALID_STATUS',
  // startup
  THEME_BOOTSTRAP: 'THEME_BOOTSTRAP',
  PLUGIN_BOOTSTRAP: 'PLUGIN_BOOTSTRAP',
  // resolver
  CONTEXT_ERROR: 'CONTEXT_ERROR',
  // request flow
  UNKNOWN_THEME: 'UNKNOWN_THEME',
  PLUGIN_TIMEOUT: 'PLUGIN_TIMEOUT',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

// ---------------------------------------------------------------------------
// Recoverability
// ---------------------------------------------------------------------------

/** Whether an error with the given code is absorbed without failing the request. */
export const ERROR_RECOVERABLE: Readonly<Record<ErrorCodeValue, boolean>> = {
  EVAL_ERROR: false,
  CALL_ERROR: true,
  CONVERSION: true,
  INVALID_HEADER_VALUE: true,
  INVALID_REGEX: false,
  HTML_REWRITE: false,
  JSON_AFTER_REGEX: false,
  JSON_PATCH: false,
  TEMPLATE: false,
  IO: false,
  MISSING_CONTEXT: false,
  MISSING_BODY: false,
  INVALID_STATUS: false,
  THEME_BOOTSTRAP: false,
  PLUGIN_BOOTSTRAP: false,
  CONTEXT_ERROR: true,
  UNKNOWN_THEME: false,
  PLUGIN_TIMEOUT: true,
};

/** Wire form of an error, as it crosses the worker-thread boundary. */
export interface ErrorPayload {
  code: ErrorCodeValue;
  message: string;
}

const CODE_SET: ReadonlySet<string> = new Set(Object.values(ErrorCode));

/** Narrow an arbitrary string to an `ErrorCodeValue`. */
export function isErrorCode(value: unknown): value is ErrorCodeValue {
  return typeof value === 'string' && CODE_SET.has(value);
}
