/**
 * Context model: what a request carries through the middleware, the
 * theme and the render pipeline.
 *
 * Contexts are immutable values. Every step that changes one returns a
 * new context, so the caller can keep the previous value when a script
 * fails or misses its deadline.
 */

import type { JsonObject, JsonValue } from './json.js';
import type { Recommendations } from './recommendations.js';

// ---------------------------------------------------------------------------
// Content
// ---------------------------------------------------------------------------

export type ContentKind = 'asset' | 'html' | 'json';

export interface ResolvedContent {
  readonly kind: ContentKind;
  /** Parsed front matter; `{}` when the file has none. */
  readonly frontMatter: JsonObject;
  /** Location of the matched file, or null when nothing matched. */
  readonly bodyPath: string | null;
  /** Text following the front matter, for html and json files. */
  readonly body: string | null;
}

export const EMPTY_CONTENT: ResolvedContent = Object.freeze({
  kind: 'asset',
  frontMatter: {},
  bodyPath: null,
  body: null,
});

// ---------------------------------------------------------------------------
// Response
// ---------------------------------------------------------------------------

export type ResponseBodySpec =
  | { readonly kind: 'unset' }
  | { readonly kind: 'none' }
  | { readonly kind: 'htmlTemplate'; readonly template: string; readonly model: JsonValue }
  | { readonly kind: 'htmlString'; readonly html: string }
  | { readonly kind: 'json'; readonly value: JsonValue };

export type ResponseBodyKind = ResponseBodySpec['kind'];

/** Canonical header name → values, in insertion order. */
export type ResponseHeaders = Readonly<Record<string, readonly string[]>>;

export interface ResponseSpec {
  readonly status: number;
  readonly headers: ResponseHeaders;
  readonly body: ResponseBodySpec;
}

export const DEFAULT_STATUS = 200;

export function emptyResponseSpec(): ResponseSpec {
  return { status: DEFAULT_STATUS, headers: {}, body: { kind: 'unset' } };
}

// ---------------------------------------------------------------------------
// RequestContext
// ---------------------------------------------------------------------------

export interface RequestContext {
  /** UUID v4 assigned on ingress. */
  readonly requestId: string;
  readonly path: string;
  readonly method: string;
  readonly version: string;
  /** Canonical header name → value. */
  readonly headers: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, string>>;
  readonly content: ResolvedContent;
  readonly themeConfig: JsonObject;
  readonly pluginConfigs: Readonly<Record<string, JsonObject>>;
  readonly recommendations: Recommendations;
  readonly response: ResponseSpec;
}
