import { describe, it, expect } from 'vitest';
import { applyRegexes, compileRegexPatches } from './regex.js';
import type { RegexPatch } from '../types/recommendations.js';
import { isCoreError } from '../core/core-error.js';
import { ErrorCode } from '../types/errors.js';

function patch(pattern: string, replacement: string, source = 'p'): RegexPatch {
  return { kind: 'regex', pattern, replacement, source };
}

describe('compileRegexPatches', () => {
  it('keeps the patch order and sources', () => {
    const rules = compileRegexPatches([patch('a', 'b', 'one'), patch('c', 'd', 'two')]);
    expect(rules.map((rule) => rule.source)).toEqual(['one', 'two']);
    expect(rules[0].regex.flags).toBe('gu');
  });

  it('rejects an invalid pattern with INVALID_REGEX', () => {
    let caught: unknown;
    try {
      compileRegexPatches([patch('ok', 'x'), patch('(unclosed', 'x', 'bad-plugin')]);
    } catch (err) {
      caught = err;
    }
    expect(isCoreError(caught)).toBe(true);
    if (isCoreError(caught)) {
      expect(caught.code).toBe(ErrorCode.INVALID_REGEX);
      expect(caught.detail).toEqual({ pattern: '(unclosed', source: 'bad-plugin' });
    }
  });
});

describe('applyRegexes', () => {
  it('replaces every match', () => {
    const rules = compileRegexPatches([patch('cat', 'dog')]);
    expect(applyRegexes('cat, cat, cat', rules)).toBe('dog, dog, dog');
  });

  it('applies rules in order, each on the previous output', () => {
    const rules = compileRegexPatches([patch('a', 'b'), patch('b', 'c')]);
    expect(applyRegexes('ab', rules)).toBe('cc');
  });

  it('supports capture group substitutions', () => {
    const rules = compileRegexPatches([patch('(\\w+)@(\\w+)', '$2 at $1')]);
    expect(applyRegexes('me@host', rules)).toBe('host at me');
  });

  it('returns the input unchanged without rules', () => {
    expect(applyRegexes('same', [])).toBe('same');
  });
});
