import { describe, it, expect } from 'vitest';
import { rewriteHtml } from './html-rewriter.js';
import type { DomOp, HtmlDomPatch } from '../types/recommendations.js';
import { isCoreError } from '../core/core-error.js';
import { ErrorCode } from '../types/errors.js';

function dom(selector: string, ...ops: DomOp[]): HtmlDomPatch {
  return { kind: 'htmlDom', selector, ops, source: 'p' };
}

describe('rewriteHtml', () => {
  it('returns the input untouched without patches', () => {
    expect(rewriteHtml("<p class='a'>x</p>", [])).toBe("<p class='a'>x</p>");
  });

  it('appends a class token', () => {
    const out = rewriteHtml("<p class='a'>1</p>", [dom('p', { kind: 'addClass', class: 'b' })]);
    expect(out).toBe('<p class="a b">1</p>');
  });

  it('does not add a class token twice', () => {
    const out = rewriteHtml('<p class="a b">1</p>', [dom('p', { kind: 'addClass', class: 'a' })]);
    expect(out).toBe('<p class="a b">1</p>');
  });

  it('removes every occurrence of a class and drops an empty attribute', () => {
    const patches = [
      dom('div', { kind: 'removeClass', class: 'x' }),
      dom('div', { kind: 'removeClass', class: 'y' }),
    ];
    expect(rewriteHtml('<div class="x y x">t</div>', patches.slice(0, 1))).toBe(
      '<div class="y">t</div>',
    );
    expect(rewriteHtml('<div class="x y x">t</div>', patches)).toBe('<div>t</div>');
  });

  it('sets and removes attributes', () => {
    const out = rewriteHtml('<a href="/x" title="t">go</a>', [
      dom(
        'a',
        { kind: 'setAttr', name: 'href', value: '/y' },
        { kind: 'removeAttr', name: 'title' },
      ),
    ]);
    expect(out).toBe('<a href="/y">go</a>');
  });

  it('escapes text set as inner text', () => {
    const out = rewriteHtml('<p>dog</p>', [
      dom('p', { kind: 'setInnerText', text: 'fish & chips' }),
    ]);
    expect(out).toBe('<p>fish &amp; chips</p>');
  });

  it('inserts HTML-typed input as markup', () => {
    const out = rewriteHtml('<ul><li>b</li></ul>', [
      dom(
        'ul',
        { kind: 'prependHtml', html: '<li>a</li>' },
        { kind: 'appendHtml', html: '<li>c</li>' },
      ),
    ]);
    expect(out).toBe('<ul><li>a</li><li>b</li><li>c</li></ul>');
  });

  it('runs ops on an element in order', () => {
    const out = rewriteHtml('<p>old</p>', [
      dom('p', { kind: 'setInnerHtml', html: '<b>x</b>' }, { kind: 'appendHtml', html: '!' }),
    ]);
    expect(out).toBe('<p><b>x</b>!</p>');
  });

  it('replaces an element with escaped text', () => {
    const out = rewriteHtml('<p><b>x</b></p>', [
      dom('b', { kind: 'replaceWithText', text: '<i>' }),
    ]);
    expect(out).toBe('<p>&lt;i&gt;</p>');
  });

  it('replaces an element with markup', () => {
    const out = rewriteHtml('<p><b>x</b></p>', [
      dom('b', { kind: 'replaceWithHtml', html: '<em>y</em>' }),
    ]);
    expect(out).toBe('<p><em>y</em></p>');
  });

  it('inserts siblings before and after', () => {
    const out = rewriteHtml('<p>mid</p>', [
      dom(
        'p',
        { kind: 'insertBeforeText', text: 'a&b' },
        { kind: 'insertAfterHtml', html: '<hr>' },
      ),
    ]);
    expect(out).toBe('a&amp;b<p>mid</p><hr>');
  });

  it('removes matched elements', () => {
    const out = rewriteHtml('<div><span class="ad">x</span><span>y</span></div>', [
      dom('.ad', { kind: 'remove' }),
    ]);
    expect(out).toBe('<div><span>y</span></div>');
  });

  it('unwraps an element, keeping its children', () => {
    const out = rewriteHtml('<div><em>a<b>b</b></em></div>', [dom('em', { kind: 'unwrap' })]);
    expect(out).toBe('<div>a<b>b</b></div>');
  });

  it('applies a patch to every matching element', () => {
    const out = rewriteHtml('<i>1</i><i>2</i>', [
      dom('i', { kind: 'setAttr', name: 'data-n', value: 'x' }),
    ]);
    expect(out).toBe('<i data-n="x">1</i><i data-n="x">2</i>');
  });

  it('never matches markup inserted by an earlier patch', () => {
    const out = rewriteHtml('<div></div>', [
      dom('div', { kind: 'appendHtml', html: '<div></div>' }),
      dom('div', { kind: 'setAttr', name: 'data-x', value: '1' }),
    ]);
    expect(out).toBe('<div data-x="1"><div></div></div>');
  });

  it('keeps the shell of a whole document', () => {
    const html = '<!DOCTYPE html><html><head></head><body><p>x</p></body></html>';
    const out = rewriteHtml(html, [dom('p', { kind: 'addClass', class: 'k' })]);
    expect(out).toBe('<!DOCTYPE html><html><head></head><body><p class="k">x</p></body></html>');
  });

  it('fails with HTML_REWRITE on an invalid selector', () => {
    let caught: unknown;
    try {
      rewriteHtml('<p>x</p>', [dom('p[', { kind: 'remove' })]);
    } catch (err) {
      caught = err;
    }
    expect(isCoreError(caught) && caught.code).toBe(ErrorCode.HTML_REWRITE);
  });
});
