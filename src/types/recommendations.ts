/**
 * Recommendations: the append-only accumulator of header, model and body
 * mutations proposed by plugins and themes.
 *
 * Patches are appended in execution order and never reordered; each
 * carries the id of the plugin or theme that produced it.
 */

import type { JsonValue } from './json.js';

// ---------------------------------------------------------------------------
// Header patches
// ---------------------------------------------------------------------------

export type HeaderPatchKind = 'set' | 'append' | 'remove';

export interface HeaderPatch {
  readonly kind: HeaderPatchKind;
  readonly name: string;
  /** Absent for `remove`. */
  readonly value?: string;
  readonly source: string;
}

// ---------------------------------------------------------------------------
// Model patches
// ---------------------------------------------------------------------------

/** An RFC 6902 document targeting the template model. */
export interface ModelPatch {
  readonly patch: JsonValue;
  readonly source: string;
}

// ---------------------------------------------------------------------------
// DOM operations
// ---------------------------------------------------------------------------

export type DomOp =
  | { readonly kind: 'setAttr'; readonly name: string; readonly value: string }
  | { readonly kind: 'removeAttr'; readonly name: string }
  | { readonly kind: 'addClass'; readonly class: string }
  | { readonly kind: 'removeClass'; readonly class: string }
  | { readonly kind: 'setInnerHtml'; readonly html: string }
  | { readonly kind: 'setInnerText'; readonly text: string }
  | { readonly kind: 'appendHtml'; readonly html: string }
  | { readonly kind: 'prependHtml'; readonly html: string }
  | { readonly kind: 'replaceWithHtml'; readonly html: string }
  | { readonly kind: 'replaceWithText'; readonly text: string }
  | { readonly kind: 'insertBeforeHtml'; readonly html: string }
  | { readonly kind: 'insertBeforeText'; readonly text: string }
  | { readonly kind: 'insertAfterHtml'; readonly html: string }
  | { readonly kind: 'insertAfterText'; readonly text: string }
  | { readonly kind: 'remove' }
  | { readonly kind: 'unwrap' };

export type DomOpKind = DomOp['kind'];

// ---------------------------------------------------------------------------
// Body patches
// ---------------------------------------------------------------------------

export interface RegexPatch {
  readonly kind: 'regex';
  readonly pattern: string;
  readonly replacement: string;
  readonly source: string;
}

export interface HtmlDomPatch {
  readonly kind: 'htmlDom';
  readonly selector: string;
  readonly ops: readonly DomOp[];
  readonly source: string;
}

export interface JsonPatchPatch {
  readonly kind: 'jsonPatch';
  readonly patch: JsonValue;
  readonly source: string;
}

export type BodyPatch = RegexPatch | HtmlDomPatch | JsonPatchPatch;

// ---------------------------------------------------------------------------
// Recommendations
// ---------------------------------------------------------------------------

export interface Recommendations {
  readonly headerPatches: readonly HeaderPatch[];
  readonly modelPatches: readonly ModelPatch[];
  readonly bodyPatches: readonly BodyPatch[];
}

export const EMPTY_RECOMMENDATIONS: Recommendations = Object.freeze({
  headerPatches: [],
  modelPatches: [],
  bodyPatches: [],
});

/** Append `extra` after `base`, preserving the order of both. */
export function appendRecommendations(
  base: Recommendations,
  extra: Recommendations,
): Recommendations {
  if (
    extra.headerPatches.length === 0 &&
    extra.modelPatches.length === 0 &&
    extra.bodyPatches.length === 0
  ) {
    return base;
  }
  return {
    headerPatches: [...base.headerPatches, ...extra.headerPatches],
    modelPatches: [...base.modelPatches, ...extra.modelPatches],
    bodyPatches: [...base.bodyPatches, ...extra.bodyPatches],
  };
}
