/**
 * Context builder: turns the parts of an HTTP request and its resolved
 * content into a fresh {@link RequestContext}.
 */

import { randomUUID } from 'node:crypto';
import type { JsonObject } from '../types/json.js';
import type { RequestContext, ResolvedContent } from '../types/context.js';
import { emptyResponseSpec } from '../types/context.js';
import { EMPTY_RECOMMENDATIONS } from '../types/recommendations.js';
import { normalizeRequestHeaders } from './headers.js';

/** The request as the HTTP adapter sees it. */
export interface RequestParts {
  /** Percent-decoded path. */
  path: string;
  method: string;
  /** e.g. `"HTTP/1.1"`. */
  version: string;
  headers: Readonly<Record<string, string | readonly string[] | undefined>>;
  query: Readonly<Record<string, string>>;
}

export type ContextBuilder = (parts: RequestParts, content: ResolvedContent) => RequestContext;

export interface ContextBuilderOptions {
  /** `[plugin_config.<id>]` tables. */
  pluginConfigs?: Readonly<Record<string, JsonObject>>;
  /** Config seen before a theme is selected; the dispatcher replaces it. */
  themeConfig?: JsonObject;
  /** Request id source. Defaults to `crypto.randomUUID`. */
  newId?: () => string;
}

export function createContextBuilder(options: ContextBuilderOptions = {}): ContextBuilder {
  const pluginConfigs = options.pluginConfigs ?? {};
  const themeConfig = options.themeConfig ?? {};
  const newId = options.newId ?? randomUUID;

  return (parts, content) => ({
    requestId: newId(),
    path: parts.path,
    method: parts.method.toUpperCase(),
    version: parts.version,
    headers: normalizeRequestHeaders(parts.headers),
    query: { ...parts.query },
    content,
    themeConfig,
    pluginConfigs,
    recommendations: EMPTY_RECOMMENDATIONS,
    response: emptyResponseSpec(),
  });
}
