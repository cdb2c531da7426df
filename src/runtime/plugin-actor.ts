/**
 * Plugin actor: one engine shared by every plugin, driven through a
 * mailbox so no two hooks ever run at the same time.
 *
 * Each plugin attaches an object to the global slot named by its id and
 * may expose `init`, `before` and `after`. Which hooks exist is recorded
 * after load and again after `init` has run, so hooks an `init` attaches
 * are picked up. A hook the plugin does not define returns the context
 * unchanged without entering the engine.
 */

import type { JsonValue } from '../types/json.js';
import type { RequestContext } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage, isCoreError } from '../core/core-error.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { EngineClient } from '../script/engine-client.js';
import { mergeSnapshot, snapshotForPlugin } from '../script/ctx-bridge.js';
import { Mailbox } from './mailbox.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ScriptSource {
  id: string;
  name: string;
  source: string;
}

export type PluginHook = 'init' | 'before' | 'after';

const PLUGIN_HOOKS: readonly PluginHook[] = ['init', 'before', 'after'];

export interface PluginActorOptions {
  engine: EngineClient;
  logger?: Logger;
  /** Clock for queued-deadline checks. Defaults to `Date.now`. */
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Probing
// ---------------------------------------------------------------------------

/**
 * Source that evaluates to the names of `hooks` defined as functions on
 * `globalThis[id]`, or `null` when the slot holds no object.
 */
export function hookProbeSource(id: string, hooks: readonly string[]): string {
  return `(() => {
  const slot = globalThis[${JSON.stringify(id)}];
  if (typeof slot !== 'object' || slot === null) return null;
  return ${JSON.stringify(hooks)}.filter((hook) => typeof slot[hook] === 'function');
})()`;
}

/** Parse a probe result into the hook names it lists. */
export function parseProbe<T extends string>(
  result: JsonValue,
  hooks: readonly T[],
): Set<T> | null {
  if (!Array.isArray(result)) return null;
  return new Set(hooks.filter((hook) => result.includes(hook)));
}

export function isMissingFunction(err: unknown): boolean {
  return (
    isCoreError(err) &&
    err.code === ErrorCode.CALL_ERROR &&
    err.message.includes('is not a function')
  );
}

// ---------------------------------------------------------------------------
// PluginActor
// ---------------------------------------------------------------------------

export class PluginActor {
  private readonly engine: EngineClient;
  private readonly mailbox: Mailbox;
  private readonly logger: Logger;
  private readonly plugins = new Map<string, Set<PluginHook>>();

  constructor(options: PluginActorOptions) {
    this.engine = options.engine;
    this.logger = options.logger ?? createLogger('actor:plugins');
    this.mailbox = new Mailbox({ name: 'plugin actor', now: options.now });
  }

  /** Registered plugin ids in registration order. */
  get ids(): string[] {
    return [...this.plugins.keys()];
  }

  hasHook(id: string, hook: PluginHook): boolean {
    return this.plugins.get(id)?.has(hook) ?? false;
  }

  /**
   * Evaluate and register `plugin`.
   *
   * @throws CoreError PLUGIN_BOOTSTRAP when the source fails to evaluate or
   *   attaches no object under its id
   */
  load(plugin: ScriptSource): Promise<void> {
    return this.mailbox.post(async () => {
      if (this.plugins.has(plugin.id)) {
        throw new CoreError(ErrorCode.PLUGIN_BOOTSTRAP, `plugin "${plugin.id}" is already loaded`);
      }
      let hooks: Set<PluginHook> | null;
      try {
        await this.engine.loadModule(plugin.id, plugin.source);
        hooks = await this.probe(plugin.id);
      } catch (err) {
        throw new CoreError(
          ErrorCode.PLUGIN_BOOTSTRAP,
          `plugin "${plugin.id}" failed to load: ${errorMessage(err)}`,
          { cause: err },
        );
      }
      if (hooks === null) {
        throw new CoreError(
          ErrorCode.PLUGIN_BOOTSTRAP,
          `plugin "${plugin.id}" did not attach an object to globalThis["${plugin.id}"]`,
        );
      }
      this.plugins.set(plugin.id, hooks);
      this.logger.debug('plugin loaded', {
        plugin: plugin.id,
        name: plugin.name,
        hooks: [...hooks],
      });
    });
  }

  /**
   * Call `init` on every plugin in registration order, then record each
   * plugin's hooks again. Return values are ignored; failures are logged
   * and the remaining plugins still run.
   */
  initAll(ctx: RequestContext): Promise<void> {
    return this.mailbox.post(async () => {
      for (const id of this.plugins.keys()) {
        try {
          await this.invoke(id, 'init', ctx);
        } catch (err) {
          this.logger.warn('plugin init failed', {
            plugin: id,
            error_code: isCoreError(err) ? err.code : undefined,
            error: errorMessage(err),
          });
        }
      }
      for (const id of this.plugins.keys()) {
        await this.refreshHooks(id);
      }
    });
  }

  /** Run `<id>.before`; the command is dropped if `deadline` passes while queued. */
  before(id: string, ctx: RequestContext, deadline?: number): Promise<RequestContext> {
    return this.mailbox.post(() => this.invoke(id, 'before', ctx), deadline);
  }

  /** Run `<id>.after`; the command is dropped if `deadline` passes while queued. */
  after(id: string, ctx: RequestContext, deadline?: number): Promise<RequestContext> {
    return this.mailbox.post(() => this.invoke(id, 'after', ctx), deadline);
  }

  close(): Promise<void> {
    return this.engine.close();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async probe(id: string): Promise<Set<PluginHook> | null> {
    const result = await this.engine.evaluate(hookProbeSource(id, PLUGIN_HOOKS), `${id}:probe`);
    return parseProbe(result, PLUGIN_HOOKS);
  }

  private async refreshHooks(id: string): Promise<void> {
    let hooks: Set<PluginHook> | null;
    try {
      hooks = await this.probe(id);
    } catch (err) {
      this.logger.warn('plugin hooks could not be refreshed', {
        plugin: id,
        error: errorMessage(err),
      });
      return;
    }
    // A plugin that replaced its slot with a non-object keeps no hooks.
    const next = hooks ?? new Set<PluginHook>();
    this.plugins.set(id, next);
    this.logger.debug('plugin hooks refreshed', { plugin: id, hooks: [...next] });
  }

  private async invoke(
    id: string,
    hook: PluginHook,
    ctx: RequestContext,
  ): Promise<RequestContext> {
    const hooks = this.plugins.get(id);
    if (hooks === undefined) {
      throw new CoreError(ErrorCode.CALL_ERROR, `plugin "${id}" is not loaded`);
    }
    if (!hooks.has(hook)) return ctx;

    let returned: JsonValue;
    try {
      returned = await this.engine.call(`${id}.${hook}`, [snapshotForPlugin(ctx, id)]);
    } catch (err) {
      if (isMissingFunction(err)) return ctx;
      throw err;
    }
    return mergeSnapshot(ctx, returned, id, this.logger.withContext({ plugin: id }));
  }
}
