import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ThemeActor } from './theme-actor.js';
import { InlineEngineClient } from '../script/engine-client.js';
import type { EngineClient } from '../script/engine-client.js';
import { configureLogging, resetLogging } from '../core/logger.js';
import { createRecordingSink, createTestContext } from '../testing/factories.js';
import type { RecordingSink } from '../testing/factories.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const BLOG = `
globalThis.blog = {
  handle(ctx) {
    ctx.response.status = 201;
    ctx.response.headers['X-Theme'] = ['blog'];
    ctx.response.body = {
      kind: 'htmlTemplate',
      template: 'post',
      model: { title: ctx.content.meta.title, accent: ctx.config.accent },
    };
    ctx.recommend.bodyPatches.push({ kind: 'regex', pattern: 'a', replacement: 'b' });
    return ctx;
  },
};
`;

function theme(id: string, source: string): { id: string; name: string; source: string } {
  return { id, name: id, source };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ThemeActor', () => {
  let engines: EngineClient[];
  let actor: ThemeActor;
  let recording: RecordingSink;

  beforeEach(() => {
    recording = createRecordingSink();
    configureLogging({ level: 'debug', sink: recording.sink });
    engines = [];
    actor = new ThemeActor({
      engineFactory: (name) => {
        const engine = new InlineEngineClient({ name });
        engines.push(engine);
        return engine;
      },
    });
  });

  afterEach(async () => {
    await actor.close();
    resetLogging();
  });

  it('gives every theme its own engine', async () => {
    await actor.load(theme('blog', BLOG));
    await actor.load(theme('docs', 'globalThis.docs = { handle(ctx) { return ctx; } };'));

    expect(engines.map((engine) => engine.name)).toEqual(['theme:blog', 'theme:docs']);
    expect(await engines[1].evaluate('typeof globalThis.blog')).toBe('undefined');
    expect(actor.ids).toEqual(['blog', 'docs']);
  });

  it('merges status, headers, body and recommendations from handle', async () => {
    await actor.load(theme('blog', BLOG));
    const ctx = createTestContext({
      themeConfig: { accent: 'teal' },
      content: { kind: 'html', frontMatter: { title: 'Hello' }, bodyPath: null, body: null },
    });

    const result = await actor.render('blog', ctx);

    expect(result.body).toEqual({
      kind: 'htmlTemplate',
      template: 'post',
      model: { title: 'Hello', accent: 'teal' },
    });
    expect(result.ctx.response.status).toBe(201);
    expect(result.ctx.response.headers).toEqual({ 'X-Theme': ['blog'] });
    expect(result.ctx.recommendations.bodyPatches).toEqual([
      { kind: 'regex', pattern: 'a', replacement: 'b', source: 'blog' },
    ]);
  });

  it('keeps a body a plugin already set', async () => {
    await actor.load(theme('plain', 'globalThis.plain = { handle() { return 42; } };'));
    const ctx = createTestContext({
      response: { status: 200, headers: {}, body: { kind: 'htmlString', html: '<p>x</p>' } },
    });

    const result = await actor.render('plain', ctx);

    expect(result.ctx).toBe(ctx);
    expect(result.body).toEqual({ kind: 'htmlString', html: '<p>x</p>' });
  });

  it('fails when no body was produced', async () => {
    await actor.load(theme('lazy', 'globalThis.lazy = { handle(ctx) { return ctx; } };'));

    await expect(actor.render('lazy', createTestContext())).rejects.toMatchObject({
      code: 'MISSING_BODY',
      message: 'theme "lazy" did not produce a response body',
    });
  });

  it('rejects unknown themes', async () => {
    await expect(actor.render('nope', createTestContext())).rejects.toMatchObject({
      code: 'UNKNOWN_THEME',
    });
  });

  it('surfaces errors thrown by handle', async () => {
    await actor.load(theme('bad', 'globalThis.bad = { handle() { throw new Error("broken"); } };'));

    await expect(actor.render('bad', createTestContext())).rejects.toMatchObject({
      code: 'CALL_ERROR',
      message: 'broken',
    });
  });

  it('requires a handle function', async () => {
    await expect(
      actor.load(theme('half', 'globalThis.half = { init() {} };')),
    ).rejects.toMatchObject({
      code: 'THEME_BOOTSTRAP',
      message: 'theme "half" must attach an object with handle() to globalThis["half"]',
    });
    expect(actor.has('half')).toBe(false);
  });

  it('logs init failures without throwing', async () => {
    await actor.load(
      theme('flaky', 'globalThis.flaky = { init() { throw new Error("x"); }, handle() {} };'),
    );
    await actor.load(theme('blog', BLOG));

    await actor.initAll(createTestContext());

    const failures = recording.at('warn', 'theme init failed');
    expect(failures.map((entry) => entry.theme)).toEqual(['flaky']);
  });

  it('hands each theme its own config at init', async () => {
    const source = (id: string): string =>
      `globalThis.${id} = { init(ctx) { globalThis.seen = ctx.config; }, handle() {} };`;
    await actor.load(theme('dark', source('dark')));
    await actor.load(theme('light', source('light')));

    await actor.initAll(createTestContext(), { dark: { accent: 'black' } });

    expect(await engines[0].evaluate('seen')).toEqual({ accent: 'black' });
    expect(await engines[1].evaluate('seen')).toEqual({});
  });
});
