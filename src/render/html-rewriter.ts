/**
 * HTML rewriter: applies DOM body patches to rendered HTML in one parse.
 *
 * Every selector is matched against the document as parsed, before any
 * patch runs, so markup inserted by one patch is never matched by
 * another. Patches then run in registration order and, for each matched
 * element, their ops run in order. Text-typed ops escape their input;
 * HTML-typed ops insert it as markup.
 */

import { load } from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import { escapeText } from 'entities';
import type { DomOp, HtmlDomPatch } from '../types/recommendations.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from '../core/core-error.js';

/** A whole document rather than a fragment: parsed and written back with its shell. */
const DOCUMENT_PATTERN = /^\s*<(?:!doctype|html)[\s>]/i;

/**
 * Apply `patches` to `html`.
 *
 * @throws CoreError HTML_REWRITE for an invalid selector or a failed op
 */
export function rewriteHtml(html: string, patches: readonly HtmlDomPatch[]): string {
  if (patches.length === 0) return html;
  try {
    const $ = load(html, null, DOCUMENT_PATTERN.test(html));
    const targets = patches.map((patch) => $<Element, string>(patch.selector).toArray());
    patches.forEach((patch, index) => {
      for (const element of targets[index]) {
        const node = $(element);
        for (const op of patch.ops) {
          applyDomOp(node, op);
        }
      }
    });
    return $.html();
  } catch (err) {
    throw new CoreError(ErrorCode.HTML_REWRITE, `HTML rewrite failed: ${errorMessage(err)}`, {
      cause: err,
      detail: { selectors: patches.map((patch) => patch.selector) },
    });
  }
}

// ---------------------------------------------------------------------------
// Ops
// ---------------------------------------------------------------------------

export function applyDomOp(node: Cheerio<Element>, op: DomOp): void {
  switch (op.kind) {
    case 'setAttr':
      node.attr(op.name, op.value);
      return;
    case 'removeAttr':
      node.removeAttr(op.name);
      return;
    case 'addClass': {
      const tokens = classTokens(node);
      if (op.class.length > 0 && !tokens.includes(op.class)) tokens.push(op.class);
      setClassTokens(node, tokens);
      return;
    }
    case 'removeClass':
      setClassTokens(
        node,
        classTokens(node).filter((token) => token !== op.class),
      );
      return;
    case 'setInnerHtml':
      node.html(op.html);
      return;
    case 'setInnerText':
      node.text(op.text);
      return;
    case 'appendHtml':
      node.append(op.html);
      return;
    case 'prependHtml':
      node.prepend(op.html);
      return;
    case 'replaceWithHtml':
      node.replaceWith(op.html);
      return;
    case 'replaceWithText':
      node.replaceWith(escapeText(op.text));
      return;
    case 'insertBeforeHtml':
      node.before(op.html);
      return;
    case 'insertBeforeText':
      node.before(escapeText(op.text));
      return;
    case 'insertAfterHtml':
      node.after(op.html);
      return;
    case 'insertAfterText':
      node.after(escapeText(op.text));
      return;
    case 'remove':
      node.remove();
      return;
    case 'unwrap':
      node.replaceWith(node.contents());
      return;
  }
}

function classTokens(node: Cheerio<Element>): string[] {
  return (node.attr('class') ?? '').split(/\s+/).filter((token) => token.length > 0);
}

/** Write `class` back; an empty list drops the attribute. */
function setClassTokens(node: Cheerio<Element>, tokens: readonly string[]): void {
  if (tokens.length === 0) node.removeAttr('class');
  else node.attr('class', tokens.join(' '));
}
