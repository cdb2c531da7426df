/**
 * Front matter detection and parsing.
 *
 * - YAML: file starts with a `---` line, closed by a `---` line
 * - TOML: file starts with a `+++` line, closed by a `+++` line
 * - JSON: first non-whitespace character is `{`; one balanced object is
 *   read and the body starts after it
 *
 * An unterminated fence means the document has no front matter.
 */

import { parse as parseYAML } from 'yaml';
import { parse as parseTOML } from 'smol-toml';
import type { JsonObject } from '../types/json.js';
import { isJsonObject } from '../types/json.js';
import { fromScriptValue } from '../script/value-bridge.js';

export type FrontMatterFormat = 'yaml' | 'toml' | 'json';

export interface ParsedDocument {
  format: FrontMatterFormat | null;
  frontMatter: JsonObject;
  body: string;
}

const BOM = '﻿';

/**
 * Split `text` into front matter and body.
 *
 * @throws whatever the YAML, TOML or JSON parser throws for a malformed
 *   header; callers that must not fail treat that as no front matter.
 */
export function parseFrontMatter(input: string): ParsedDocument {
  const text = input.startsWith(BOM) ? input.slice(BOM.length) : input;
  const none: ParsedDocument = { format: null, frontMatter: {}, body: text };

  const yaml = openFence(text, '---');
  if (yaml !== null) {
    const split = takeUntilFence(yaml, '---');
    if (split === null) return none;
    return { format: 'yaml', frontMatter: asObject(parseYAML(split.header)), body: split.body };
  }

  const toml = openFence(text, '+++');
  if (toml !== null) {
    const split = takeUntilFence(toml, '+++');
    if (split === null) return none;
    return { format: 'toml', frontMatter: asObject(parseTOML(split.header)), body: split.body };
  }

  if (text.trimStart().startsWith('{')) {
    const split = sliceJsonObject(text);
    if (split === null) {
      // Looks like JSON but never balances: let the parser report why.
      JSON.parse(text);
      return none;
    }
    const parsed: unknown = JSON.parse(split.header);
    return { format: 'json', frontMatter: asObject(parsed), body: split.body };
  }

  return none;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function asObject(value: unknown): JsonObject {
  const json = fromScriptValue(value);
  return isJsonObject(json) ? json : {};
}

function openFence(text: string, fence: string): string | null {
  if (text.startsWith(`${fence}\n`)) return text.slice(fence.length + 1);
  if (text.startsWith(`${fence}\r\n`)) return text.slice(fence.length + 2);
  return null;
}

/** Find the first line that is exactly `fence`. */
function takeUntilFence(rest: string, fence: string): { header: string; body: string } | null {
  let index = 0;
  while (index <= rest.length) {
    const newline = rest.indexOf('\n', index);
    const lineEnd = newline === -1 ? rest.length : newline + 1;
    const line = rest.slice(index, lineEnd).replace(/\r?\n$/, '');
    if (line === fence) {
      return { header: rest.slice(0, index), body: rest.slice(lineEnd) };
    }
    if (newline === -1) break;
    index = lineEnd;
  }
  return null;
}

/**
 * Slice one balanced top-level JSON object from the start of `text`,
 * skipping a single newline after it.
 */
function sliceJsonObject(text: string): { header: string; body: string } | null {
  const start = text.search(/\S/);
  if (start === -1 || text[start] !== '{') return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        let bodyStart = i + 1;
        if (text.startsWith('\r\n', bodyStart)) bodyStart += 2;
        else if (text[bodyStart] === '\n' || text[bodyStart] === '\r') bodyStart += 1;
        return { header: text.slice(start, i + 1), body: text.slice(bodyStart) };
      }
    }
  }
  return null;
}
