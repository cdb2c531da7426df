import { describe, it, expect } from 'vitest';
import {
  createTestContext,
  createHtmlContent,
  createResponse,
  createRecommendations,
  createRecordingSink,
} from './factories.js';
import { EMPTY_CONTENT } from '../types/context.js';
import { createLogger, configureLogging, resetLogging } from '../core/logger.js';

// ---------------------------------------------------------------------------
// createTestContext
// ---------------------------------------------------------------------------

describe('createTestContext', () => {
  it('produces a GET / context with empty content and response', () => {
    const ctx = createTestContext();
    expect(ctx.path).toBe('/');
    expect(ctx.method).toBe('GET');
    expect(ctx.content).toBe(EMPTY_CONTENT);
    expect(ctx.response).toEqual({ status: 200, headers: {}, body: { kind: 'unset' } });
  });

  it('replaces whole top-level fields', () => {
    const ctx = createTestContext({ path: '/blog', headers: { Accept: 'text/html' } });
    expect(ctx.path).toBe('/blog');
    expect(ctx.headers).toEqual({ Accept: 'text/html' });
    expect(ctx.requestId).toBe('req-test');
  });

  it('returns a fresh response on every call', () => {
    expect(createTestContext().response).not.toBe(createTestContext().response);
  });
});

// ---------------------------------------------------------------------------
// Content, response and recommendations
// ---------------------------------------------------------------------------

describe('createHtmlContent', () => {
  it('builds html content with a default body path', () => {
    expect(createHtmlContent('<p>hi</p>', { title: 'Hi' })).toEqual({
      kind: 'html',
      frontMatter: { title: 'Hi' },
      bodyPath: '/content/index.html',
      body: '<p>hi</p>',
    });
  });
});

describe('createResponse', () => {
  it('overrides the default response fields', () => {
    const response = createResponse({ status: 404 });
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ kind: 'unset' });
  });
});

describe('createRecommendations', () => {
  it('starts with empty patch lists', () => {
    const recommend = createRecommendations({
      headerPatches: [{ kind: 'set', name: 'X-A', value: '1', source: 'p' }],
    });
    expect(recommend.headerPatches).toHaveLength(1);
    expect(recommend.modelPatches).toEqual([]);
    expect(recommend.bodyPatches).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// createRecordingSink
// ---------------------------------------------------------------------------

describe('createRecordingSink', () => {
  it('captures entries and filters them by level and message', () => {
    const recording = createRecordingSink();
    configureLogging({ level: 'debug', sink: recording.sink });
    try {
      const logger = createLogger('test');
      logger.info('first');
      logger.warn('second');
      logger.info('third');

      expect(recording.entries).toHaveLength(3);
      expect(recording.at('info').map((entry) => entry.msg)).toEqual(['first', 'third']);
      expect(recording.at('warn', 'second')).toHaveLength(1);
      expect(recording.at('warn', 'first')).toEqual([]);
    } finally {
      resetLogging();
    }
  });
});
