/**
 * Patch applicator: header patches onto the response headers, model
 * patches onto a template model.
 *
 * Neither kind can fail a response. An invalid header patch or a model
 * patch document that does not apply is logged and skipped.
 */

import type { JsonValue } from '../types/json.js';
import type { RequestContext, ResponseHeaders } from '../types/context.js';
import type { HeaderPatch, ModelPatch } from '../types/recommendations.js';
import { applyJsonPatch } from '../render/json-patch.js';
import { appendHeader, removeHeader, setHeader } from './headers.js';
import { errorMessage, isCoreError } from './core-error.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

const defaultLogger = createLogger('patches');

/** Apply `patches` to `headers` in order. */
export function applyHeaderPatches(
  headers: ResponseHeaders,
  patches: readonly HeaderPatch[],
  logger: Logger = defaultLogger,
): ResponseHeaders {
  let current = headers;
  for (const patch of patches) {
    try {
      current = applyHeaderPatch(current, patch);
    } catch (err) {
      logger.debug('header patch dropped', {
        plugin: patch.source,
        kind: patch.kind,
        name: patch.name,
        error_code: isCoreError(err) ? err.code : undefined,
        error: errorMessage(err),
      });
    }
  }
  return current;
}

function applyHeaderPatch(headers: ResponseHeaders, patch: HeaderPatch): ResponseHeaders {
  switch (patch.kind) {
    case 'set':
      return setHeader(headers, patch.name, patch.value ?? '');
    case 'append':
      return appendHeader(headers, patch.name, patch.value ?? '');
    case 'remove':
      return removeHeader(headers, patch.name);
  }
}

/** Apply each model patch document in order; a failing document is skipped whole. */
export function applyModelPatches(
  model: JsonValue,
  patches: readonly ModelPatch[],
  logger: Logger = defaultLogger,
): JsonValue {
  let current = model;
  for (const patch of patches) {
    const document = Array.isArray(patch.patch) ? patch.patch : [patch.patch];
    try {
      current = applyJsonPatch(current, document);
    } catch (err) {
      logger.warn('model patch skipped', {
        plugin: patch.source,
        error_code: isCoreError(err) ? err.code : undefined,
        error: errorMessage(err),
      });
    }
  }
  return current;
}

/**
 * Apply the context's header patches, and its model patches when the
 * body is a template. An empty recommendation set returns `ctx` itself.
 */
export function applyRecommendations(
  ctx: RequestContext,
  logger: Logger = defaultLogger,
): RequestContext {
  const { headerPatches, modelPatches } = ctx.recommendations;
  const log = logger.withContext({ request: ctx.requestId });

  const headers =
    headerPatches.length === 0
      ? ctx.response.headers
      : applyHeaderPatches(ctx.response.headers, headerPatches, log);

  let body = ctx.response.body;
  if (body.kind === 'htmlTemplate' && modelPatches.length > 0) {
    body = { ...body, model: applyModelPatches(body.model, modelPatches, log) };
  }

  if (headers === ctx.response.headers && body === ctx.response.body) return ctx;
  return { ...ctx, response: { ...ctx.response, headers, body } };
}
