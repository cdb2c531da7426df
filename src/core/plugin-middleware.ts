/**
 * Plugin middleware: runs plugin hooks around the theme, one plugin at a
 * time, under a per-call deadline and a per-plugin circuit breaker.
 *
 * A failing or slow plugin never fails the request. Its hook result is
 * discarded, the context it was given carries on to the next plugin, and
 * the breaker counts the failure. An engine on the calling thread blocks
 * the timer, so a reply that arrives after the deadline also counts as
 * a timeout.
 */

import type { RequestContext } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage, isCoreError } from './core-error.js';
import { withDeadline } from './deadline.js';
import type { CircuitBreaker } from './circuit-breaker.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MiddlewareHook = 'before' | 'after';

/** What the middleware needs from the plugin actor. */
export interface PluginHookRunner {
  hasHook(id: string, hook: MiddlewareHook): boolean;
  before(id: string, ctx: RequestContext, deadline?: number): Promise<RequestContext>;
  after(id: string, ctx: RequestContext, deadline?: number): Promise<RequestContext>;
}

export interface PluginMiddlewareOptions {
  runner: PluginHookRunner;
  /** Plugin ids in registration order. */
  order: readonly string[];
  breaker: CircuitBreaker;
  /** Per-call deadline. */
  timeoutMs: number;
  logger?: Logger;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// PluginMiddleware
// ---------------------------------------------------------------------------

export class PluginMiddleware {
  private readonly runner: PluginHookRunner;
  private readonly order: readonly string[];
  private readonly breaker: CircuitBreaker;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: PluginMiddlewareOptions) {
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
      throw new Error('timeoutMs must be positive');
    }
    this.runner = options.runner;
    this.order = [...options.order];
    this.breaker = options.breaker;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? createLogger('middleware');
    this.now = options.now ?? (() => Date.now());
  }

  /** Run `before` hooks in registration order. */
  async runBefore(ctx: RequestContext): Promise<RequestContext> {
    let current = ctx;
    for (const id of this.order) {
      current = await this.runHook('before', id, current);
    }
    return current;
  }

  /** Run `after` hooks in reverse registration order. */
  async runAfter(ctx: RequestContext): Promise<RequestContext> {
    let current = ctx;
    for (const id of [...this.order].reverse()) {
      current = await this.runHook('after', id, current);
    }
    return current;
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async runHook(
    hook: MiddlewareHook,
    id: string,
    ctx: RequestContext,
  ): Promise<RequestContext> {
    if (!this.runner.hasHook(id, hook)) return ctx;

    const log = this.logger.withContext({ request: ctx.requestId, plugin: id });
    if (!this.breaker.tryAcquire(id)) {
      log.debug('plugin skipped, breaker open', { hook });
      return ctx;
    }

    const started = this.now();
    const deadline = started + this.timeoutMs;
    const reply =
      hook === 'before'
        ? this.runner.before(id, ctx, deadline)
        : this.runner.after(id, ctx, deadline);

    try {
      const next = await withDeadline(reply, this.timeoutMs, `${id}.${hook}`);
      const elapsed = this.now() - started;
      if (elapsed > this.timeoutMs) {
        throw new CoreError(
          ErrorCode.PLUGIN_TIMEOUT,
          `${id}.${hook} replied after ${elapsed}ms, past its ${this.timeoutMs}ms deadline`,
          { detail: { timeoutMs: this.timeoutMs } },
        );
      }
      this.breaker.recordSuccess(id);
      log.debug('plugin hook done', { hook, ok: true, duration_ms: elapsed });
      return next;
    } catch (err) {
      const opened = this.breaker.recordFailure(id);
      log.warn('plugin hook failed', {
        hook,
        ok: false,
        duration_ms: this.now() - started,
        error_code: isCoreError(err) ? err.code : undefined,
        error: errorMessage(err),
      });
      if (opened) {
        log.warn('circuit breaker opened', { failures: this.breaker.failures(id) });
      }
      return ctx;
    }
  }
}
