/**
 * Streaming regex writer: applies regex rules to a UTF-8 byte stream
 * without holding the whole body.
 *
 * Each rule runs as its own stage, and stage N+1 is fed what stage N
 * emits. A stage buffers its input; once the buffer grows past the tail
 * window, matches ending before the window are replaced and the text up
 * to the window is emitted. The window waits for more input so a match
 * that crosses a chunk boundary is still seen whole, and the split moves
 * back to the start of any match it would cut. Emitted input is kept as
 * context (up to one window) so anchors, lookbehind and `\b` see what
 * came before. The window must be at least as long as the longest
 * expected match.
 */

import { Transform } from 'node:stream';
import type { TransformCallback } from 'node:stream';
import { ErrorCode } from '../types/errors.js';
import { CoreError } from '../core/core-error.js';
import type { CompiledRegex } from './regex.js';

export interface RegexWriterOptions {
  rules: readonly CompiledRegex[];
  /** Characters held back between chunks. */
  tailWindow: number;
}

export class RegexWriter extends Transform {
  private readonly stages: RuleStage[];
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(options: RegexWriterOptions) {
    super();
    if (!Number.isInteger(options.tailWindow) || options.tailWindow < 1) {
      throw new Error('tailWindow must be a positive integer');
    }
    this.stages = options.rules.map((rule) => new RuleStage(rule, options.tailWindow));
  }

  _transform(
    chunk: unknown,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    let text: string;
    try {
      text = this.decode(chunk);
    } catch (err) {
      callback(invalidUtf8(err));
      return;
    }
    const out = this.feed(text, false);
    if (out.length > 0) this.push(out);
    callback();
  }

  _flush(callback: TransformCallback): void {
    let text: string;
    try {
      text = this.decoder.decode();
    } catch (err) {
      callback(invalidUtf8(err));
      return;
    }
    const rest = this.feed(text, true);
    if (rest.length > 0) this.push(rest);
    callback();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private feed(text: string, final: boolean): string {
    let out = text;
    for (const stage of this.stages) {
      out = stage.feed(out, final);
    }
    return out;
  }

  private decode(chunk: unknown): string {
    if (typeof chunk === 'string') return chunk;
    if (chunk instanceof Uint8Array) return this.decoder.decode(chunk, { stream: true });
    throw new TypeError('RegexWriter accepts strings and bytes only');
  }
}

// ---------------------------------------------------------------------------
// One rule
// ---------------------------------------------------------------------------

class RuleStage {
  private readonly regex: RegExp;
  private readonly replacement: string;
  private readonly tailWindow: number;
  /** Input already emitted, at most one window long. Empty only at stream start. */
  private context = '';
  private buffer = '';

  constructor(rule: CompiledRegex, tailWindow: number) {
    this.regex = new RegExp(rule.regex.source, rule.regex.flags);
    this.replacement = rule.replacement;
    this.tailWindow = tailWindow;
  }

  /** Take more input and return the replaced text that is now settled. */
  feed(text: string, final: boolean): string {
    this.buffer += text;
    const full = this.context + this.buffer;
    const offset = this.context.length;
    const limit = final ? full.length : full.length - this.tailWindow;
    if (limit <= offset) return '';

    let out = '';
    let pos = offset;
    let split = limit;
    this.regex.lastIndex = offset;
    for (let match = this.regex.exec(full); match; match = this.regex.exec(full)) {
      const start = match.index;
      const end = start + match[0].length;
      if (start >= limit) break;
      if (end > limit) {
        split = start;
        break;
      }
      out += full.slice(pos, start) + expandReplacement(this.replacement, match, full);
      pos = end;
      if (match[0].length === 0) this.regex.lastIndex = advance(full, end);
    }
    if (split > pos && isHighSurrogate(full.charCodeAt(split - 1))) split -= 1;
    if (split <= offset) return '';

    out += full.slice(pos, split);
    this.context = trimContext(full.slice(0, split), this.tailWindow);
    this.buffer = full.slice(split);
    return out;
  }
}

const SUBSTITUTION = /\$(\$|&|`|'|<([^>]*)>|(\d\d?))/g;

/** `String.prototype.replace` substitutions for one match of `input`. */
function expandReplacement(replacement: string, match: RegExpExecArray, input: string): string {
  if (!replacement.includes('$')) return replacement;
  const groupCount = match.length - 1;
  return replacement.replace(
    SUBSTITUTION,
    (token: string, kind: string, name: string | undefined, digits: string | undefined) => {
      if (kind === '$') return '$';
      if (kind === '&') return match[0];
      if (kind === '`') return input.slice(0, match.index);
      if (kind === "'") return input.slice(match.index + match[0].length);
      if (name !== undefined) {
        if (!match.groups) return token;
        return match.groups[name] ?? '';
      }
      if (digits === undefined) return token;
      const two = Number(digits);
      if (digits.length === 2 && two >= 1 && two <= groupCount) return match[two] ?? '';
      const one = Number(digits[0]);
      if (one >= 1 && one <= groupCount) return (match[one] ?? '') + digits.slice(1);
      return token;
    },
  );
}

/** Index after an empty match, stepping over a whole surrogate pair. */
function advance(text: string, index: number): number {
  if (isHighSurrogate(text.charCodeAt(index)) && isLowSurrogate(text.charCodeAt(index + 1))) {
    return index + 2;
  }
  return index + 1;
}

function trimContext(settled: string, tailWindow: number): string {
  if (settled.length <= tailWindow) return settled;
  let start = settled.length - tailWindow;
  if (isLowSurrogate(settled.charCodeAt(start))) start -= 1;
  return settled.slice(start);
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function invalidUtf8(err: unknown): CoreError {
  return new CoreError(ErrorCode.IO, 'response body is not valid UTF-8', { cause: err });
}
