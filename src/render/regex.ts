/**
 * Regex body patches, compiled once per request and applied in order.
 *
 * Patterns use JavaScript syntax with the `g` and `u` flags; replacement
 * strings use `String.prototype.replace` substitutions (`$1`, `$<name>`,
 * `$&`).
 */

import type { RegexPatch } from '../types/recommendations.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage } from '../core/core-error.js';

export interface CompiledRegex {
  readonly regex: RegExp;
  readonly replacement: string;
  /** Plugin or theme that proposed the patch. */
  readonly source: string;
}

/**
 * Compile every patch up front so an invalid pattern fails the request
 * before anything is rendered.
 *
 * @throws CoreError INVALID_REGEX naming the pattern
 */
export function compileRegexPatches(patches: readonly RegexPatch[]): CompiledRegex[] {
  return patches.map((patch) => {
    let regex: RegExp;
    try {
      regex = new RegExp(patch.pattern, 'gu');
    } catch (err) {
      throw new CoreError(
        ErrorCode.INVALID_REGEX,
        `invalid regex from ${patch.source}: ${errorMessage(err)}`,
        { cause: err, detail: { pattern: patch.pattern, source: patch.source } },
      );
    }
    return { regex, replacement: patch.replacement, source: patch.source };
  });
}

/** Replace every match of each rule in turn; later rules see earlier output. */
export function applyRegexes(text: string, rules: readonly CompiledRegex[]): string {
  let result = text;
  for (const rule of rules) {
    result = result.replace(rule.regex, rule.replacement);
  }
  return result;
}
