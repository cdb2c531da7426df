/**
 * Response builder: final status, headers and body bytes.
 */

import type { ResponseHeaders, ResponseSpec } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import type { RenderedBody } from '../render/pipeline.js';
import { CoreError } from './core-error.js';
import { hasHeader, setHeader } from './headers.js';

/** What the HTTP adapter writes. */
export interface ResponseParts {
  readonly status: number;
  readonly headers: ResponseHeaders;
  readonly body: Buffer;
}

export const INTERNAL_ERROR_BODY = 'Internal Server Error';

export function isValidStatus(status: number): boolean {
  return Number.isInteger(status) && status >= 100 && status <= 599;
}

/**
 * Combine `response` with the rendered body. `Content-Type` is added
 * only when the response has none; `Content-Length` always reflects the
 * bytes sent.
 *
 * @throws CoreError INVALID_STATUS when the status is not 100–599
 */
export function buildResponse(response: ResponseSpec, rendered: RenderedBody): ResponseParts {
  if (!isValidStatus(response.status)) {
    throw new CoreError(ErrorCode.INVALID_STATUS, `invalid status code ${response.status}`);
  }
  let headers = response.headers;
  if (rendered.contentType !== null && !hasHeader(headers, 'content-type')) {
    headers = setHeader(headers, 'content-type', rendered.contentType);
  }
  headers = setHeader(headers, 'content-length', String(rendered.bytes.length));
  return { status: response.status, headers, body: rendered.bytes };
}

/** The generic 500 sent for any request failure. */
export function internalErrorResponse(): ResponseParts {
  const body = Buffer.from(INTERNAL_ERROR_BODY, 'utf-8');
  return {
    status: 500,
    headers: {
      'Content-Type': ['text/plain; charset=utf-8'],
      'Content-Length': [String(body.length)],
    },
    body,
  };
}
