/**
 * Context bridge: the JSON snapshot a script receives, and the merge of
 * what it returns back into a {@link RequestContext}.
 *
 * A snapshot carries the request, the resolved content, the caller's
 * config, the current response and an empty `recommend` accumulator. On
 * return only `response` and `recommend` are read. Patches are stamped
 * with the caller's id; anything malformed is dropped and logged at
 * debug level.
 */

import type { JsonObject, JsonValue } from '../types/json.js';
import { isJsonObject, setOwn } from '../types/json.js';
import type {
  RequestContext,
  ResponseBodySpec,
  ResponseHeaders,
  ResponseSpec,
} from '../types/context.js';
import type {
  BodyPatch,
  DomOp,
  HeaderPatch,
  ModelPatch,
  Recommendations,
} from '../types/recommendations.js';
import { appendRecommendations } from '../types/recommendations.js';
import { appendHeader } from '../core/headers.js';
import { errorMessage } from '../core/core-error.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';

const defaultLogger = createLogger('ctx-bridge');

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

/** Build the snapshot handed to a script, with `config` as its own config. */
export function toSnapshot(ctx: RequestContext, config: JsonObject): JsonObject {
  return {
    request: {
      id: ctx.requestId,
      path: ctx.path,
      method: ctx.method,
      version: ctx.version,
      headers: { ...ctx.headers },
      query: { ...ctx.query },
    },
    content: {
      kind: ctx.content.kind,
      meta: ctx.content.frontMatter,
      bodyPath: ctx.content.bodyPath,
      body: ctx.content.body,
    },
    config,
    response: responseToJson(ctx.response),
    recommend: { headerPatches: [], modelPatches: [], bodyPatches: [] },
  };
}

export function snapshotForPlugin(ctx: RequestContext, pluginId: string): JsonObject {
  const config = Object.hasOwn(ctx.pluginConfigs, pluginId) ? ctx.pluginConfigs[pluginId] : {};
  return toSnapshot(ctx, config);
}

export function snapshotForTheme(ctx: RequestContext): JsonObject {
  return toSnapshot(ctx, ctx.themeConfig);
}

export function responseToJson(response: ResponseSpec): JsonObject {
  const headers: JsonObject = {};
  for (const [name, values] of Object.entries(response.headers)) {
    setOwn<JsonValue>(headers, name, [...values]);
  }
  return { status: response.status, headers, body: bodyToJson(response.body) };
}

function bodyToJson(body: ResponseBodySpec): JsonObject {
  switch (body.kind) {
    case 'unset':
    case 'none':
      return { kind: body.kind };
    case 'htmlTemplate':
      return { kind: body.kind, template: body.template, model: body.model };
    case 'htmlString':
      return { kind: body.kind, html: body.html };
    case 'json':
      return { kind: body.kind, value: body.value };
  }
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Merge a script's return value into `ctx`. A non-object return leaves
 * the context unchanged. New patches are appended after the existing
 * ones.
 */
export function mergeSnapshot(
  ctx: RequestContext,
  returned: JsonValue,
  source: string,
  logger: Logger = defaultLogger,
): RequestContext {
  if (!isJsonObject(returned)) return ctx;
  const drop = (what: string, reason: string): void =>
    logger.debug('dropped malformed script output', { source, what, reason });

  const response =
    returned['response'] === undefined
      ? ctx.response
      : parseResponse(returned['response'], ctx.response, drop);
  const recommend =
    returned['recommend'] === undefined
      ? undefined
      : parseRecommendations(returned['recommend'], source, drop);

  if (response === ctx.response && recommend === undefined) return ctx;
  return {
    ...ctx,
    response,
    recommendations:
      recommend === undefined
        ? ctx.recommendations
        : appendRecommendations(ctx.recommendations, recommend),
  };
}

type Drop = (what: string, reason: string) => void;

function parseResponse(value: JsonValue, prior: ResponseSpec, drop: Drop): ResponseSpec {
  if (!isJsonObject(value)) {
    drop('response', 'not an object');
    return prior;
  }

  let status = prior.status;
  const rawStatus = value['status'];
  if (typeof rawStatus === 'number' && Number.isInteger(rawStatus)) {
    status = rawStatus;
  } else if (rawStatus !== undefined) {
    drop('response.status', 'not an integer');
  }

  const headers =
    value['headers'] === undefined ? prior.headers : parseHeaders(value['headers'], drop);

  let body = prior.body;
  if (value['body'] !== undefined) {
    const parsed = parseBody(value['body']);
    if (parsed === null) drop('response.body', 'unknown body shape');
    else body = parsed;
  }

  return { status, headers, body };
}

function parseHeaders(value: JsonValue, drop: Drop): ResponseHeaders {
  let headers: ResponseHeaders = {};
  if (!isJsonObject(value)) {
    drop('response.headers', 'not an object');
    return headers;
  }
  for (const [name, raw] of Object.entries(value)) {
    const values = typeof raw === 'string' ? [raw] : Array.isArray(raw) ? raw : [];
    for (const entry of values) {
      if (typeof entry !== 'string') {
        drop(`response.headers.${name}`, 'value is not a string');
        continue;
      }
      try {
        headers = appendHeader(headers, name, entry);
      } catch (err) {
        drop(`response.headers.${name}`, errorMessage(err));
      }
    }
  }
  return headers;
}

function parseBody(value: JsonValue): ResponseBodySpec | null {
  if (!isJsonObject(value)) return null;
  switch (value['kind']) {
    case 'unset':
      return { kind: 'unset' };
    case 'none':
      return { kind: 'none' };
    case 'htmlTemplate': {
      const template = value['template'];
      if (typeof template !== 'string') return null;
      return { kind: 'htmlTemplate', template, model: value['model'] ?? {} };
    }
    case 'htmlString': {
      const html = value['html'];
      if (typeof html !== 'string') return null;
      return { kind: 'htmlString', html };
    }
    case 'json':
      return { kind: 'json', value: value['value'] ?? null };
    default:
      return null;
  }
}

// ---------------------------------------------------------------------------
// Recommendations
// ---------------------------------------------------------------------------

function parseRecommendations(value: JsonValue, source: string, drop: Drop): Recommendations {
  if (!isJsonObject(value)) {
    drop('recommend', 'not an object');
    return { headerPatches: [], modelPatches: [], bodyPatches: [] };
  }
  return {
    headerPatches: parseList(value['headerPatches'], 'headerPatches', drop, (entry) =>
      parseHeaderPatch(entry, source),
    ),
    modelPatches: parseList(value['modelPatches'], 'modelPatches', drop, (entry) =>
      parseModelPatch(entry, source),
    ),
    bodyPatches: parseList(value['bodyPatches'], 'bodyPatches', drop, (entry) =>
      parseBodyPatch(entry, source),
    ),
  };
}

function parseList<T>(
  value: JsonValue | undefined,
  what: string,
  drop: Drop,
  parse: (entry: JsonValue) => T | null,
): T[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    drop(`recommend.${what}`, 'not an array');
    return [];
  }
  const result: T[] = [];
  for (const [index, entry] of value.entries()) {
    const parsed = parse(entry);
    if (parsed === null) drop(`recommend.${what}[${index}]`, 'malformed patch');
    else result.push(parsed);
  }
  return result;
}

export function parseHeaderPatch(value: JsonValue, source: string): HeaderPatch | null {
  if (!isJsonObject(value)) return null;
  const { kind, name, value: headerValue } = value;
  if (typeof name !== 'string' || name.length === 0) return null;
  if (kind === 'remove') return { kind, name, source };
  if ((kind === 'set' || kind === 'append') && typeof headerValue === 'string') {
    return { kind, name, value: headerValue, source };
  }
  return null;
}

/** Patch documents are arrays of operations; a lone operation is wrapped. */
function asPatchDocument(value: JsonValue | undefined): JsonValue[] | null {
  if (Array.isArray(value)) return value;
  if (isJsonObject(value)) return [value];
  return null;
}

export function parseModelPatch(value: JsonValue, source: string): ModelPatch | null {
  if (!isJsonObject(value)) return null;
  const patch = asPatchDocument(value['patch']);
  return patch === null ? null : { patch, source };
}

export function parseBodyPatch(value: JsonValue, source: string): BodyPatch | null {
  if (!isJsonObject(value)) return null;
  switch (value['kind']) {
    case 'regex': {
      const { pattern, replacement } = value;
      if (typeof pattern !== 'string' || typeof replacement !== 'string') return null;
      return { kind: 'regex', pattern, replacement, source };
    }
    case 'htmlDom': {
      const { selector, ops } = value;
      if (typeof selector !== 'string' || selector.length === 0 || !Array.isArray(ops)) {
        return null;
      }
      const parsed: DomOp[] = [];
      for (const op of ops) {
        const domOp = parseDomOp(op);
        if (domOp === null) return null;
        parsed.push(domOp);
      }
      return { kind: 'htmlDom', selector, ops: parsed, source };
    }
    case 'jsonPatch': {
      const patch = asPatchDocument(value['patch']);
      return patch === null ? null : { kind: 'jsonPatch', patch, source };
    }
    default:
      return null;
  }
}

export function parseDomOp(value: JsonValue): DomOp | null {
  if (!isJsonObject(value)) return null;
  const str = (key: string): string | null => {
    const field = value[key];
    return typeof field === 'string' ? field : null;
  };

  const kind = value['kind'];
  switch (kind) {
    case 'setAttr': {
      const name = str('name');
      const attrValue = str('value');
      return name === null || attrValue === null ? null : { kind, name, value: attrValue };
    }
    case 'removeAttr': {
      const name = str('name');
      return name === null ? null : { kind, name };
    }
    case 'addClass':
    case 'removeClass': {
      const cls = str('class');
      return cls === null ? null : { kind, class: cls };
    }
    case 'setInnerHtml':
    case 'appendHtml':
    case 'prependHtml':
    case 'replaceWithHtml':
    case 'insertBeforeHtml':
    case 'insertAfterHtml': {
      const html = str('html');
      return html === null ? null : { kind, html };
    }
    case 'setInnerText':
    case 'replaceWithText':
    case 'insertBeforeText':
    case 'insertAfterText': {
      const text = str('text');
      return text === null ? null : { kind, text };
    }
    case 'remove':
    case 'unwrap':
      return { kind };
    default:
      return null;
  }
}
