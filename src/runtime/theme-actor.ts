/**
 * Theme actor: one engine and one mailbox per theme, so a theme that
 * wedges or corrupts its engine cannot affect another, and two themes
 * can render at the same time.
 *
 * A theme attaches an object to the global slot named by its id with a
 * mandatory `handle(ctx)` and an optional `init(ctx)`.
 */

import type { JsonObject, JsonValue } from '../types/json.js';
import type { RequestContext, ResponseBodySpec } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError, errorMessage, isCoreError } from '../core/core-error.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import type { EngineClient, EngineFactory } from '../script/engine-client.js';
import { mergeSnapshot, snapshotForTheme } from '../script/ctx-bridge.js';
import { Mailbox } from './mailbox.js';
import type { ScriptSource } from './plugin-actor.js';
import { hookProbeSource, parseProbe } from './plugin-actor.js';

type ThemeHook = 'init' | 'handle';

const THEME_HOOKS: readonly ThemeHook[] = ['init', 'handle'];

export interface ThemeRenderResult {
  ctx: RequestContext;
  body: ResponseBodySpec;
}

export interface ThemeActorOptions {
  engineFactory: EngineFactory;
  logger?: Logger;
}

interface LoadedTheme {
  engine: EngineClient;
  mailbox: Mailbox;
  hasInit: boolean;
}

export class ThemeActor {
  private readonly engineFactory: EngineFactory;
  private readonly logger: Logger;
  private readonly themes = new Map<string, LoadedTheme>();

  constructor(options: ThemeActorOptions) {
    this.engineFactory = options.engineFactory;
    this.logger = options.logger ?? createLogger('actor:themes');
  }

  get ids(): string[] {
    return [...this.themes.keys()];
  }

  has(id: string): boolean {
    return this.themes.has(id);
  }

  /**
   * Spawn an engine for `theme` and evaluate it there.
   *
   * @throws CoreError THEME_BOOTSTRAP when the source fails to evaluate or
   *   defines no `handle`
   */
  async load(theme: ScriptSource): Promise<void> {
    if (this.themes.has(theme.id)) {
      throw new CoreError(ErrorCode.THEME_BOOTSTRAP, `theme "${theme.id}" is already loaded`);
    }
    const engine = this.engineFactory(`theme:${theme.id}`);

    let hooks: Set<ThemeHook> | null;
    try {
      await engine.loadModule(theme.id, theme.source);
      const probe = await engine.evaluate(
        hookProbeSource(theme.id, THEME_HOOKS),
        `${theme.id}:probe`,
      );
      hooks = parseProbe(probe, THEME_HOOKS);
    } catch (err) {
      await engine.close();
      throw new CoreError(
        ErrorCode.THEME_BOOTSTRAP,
        `theme "${theme.id}" failed to load: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (hooks === null || !hooks.has('handle')) {
      await engine.close();
      throw new CoreError(
        ErrorCode.THEME_BOOTSTRAP,
        `theme "${theme.id}" must attach an object with handle() to globalThis["${theme.id}"]`,
      );
    }

    this.themes.set(theme.id, {
      engine,
      mailbox: new Mailbox({ name: `theme ${theme.id}` }),
      hasInit: hooks.has('init'),
    });
    this.logger.debug('theme loaded', { theme: theme.id, name: theme.name });
  }

  /**
   * Call `init` on every theme, each seeing its own entry of
   * `themeConfigs` as its config. Failures are logged, never thrown.
   */
  async initAll(
    ctx: RequestContext,
    themeConfigs: Readonly<Record<string, JsonObject>> = {},
  ): Promise<void> {
    await Promise.all(
      [...this.themes].map(async ([id, theme]) => {
        if (!theme.hasInit) return;
        const themeConfig = Object.hasOwn(themeConfigs, id) ? themeConfigs[id] : ctx.themeConfig;
        try {
          await theme.mailbox.post(() =>
            theme.engine.call(`${id}.init`, [snapshotForTheme({ ...ctx, themeConfig })]),
          );
        } catch (err) {
          this.logger.warn('theme init failed', {
            theme: id,
            error_code: isCoreError(err) ? err.code : undefined,
            error: errorMessage(err),
          });
        }
      }),
    );
  }

  /**
   * Run `<themeId>.handle` and merge its result into `ctx`.
   *
   * @throws CoreError UNKNOWN_THEME, CALL_ERROR from the script, or
   *   MISSING_BODY when no body was produced
   */
  render(themeId: string, ctx: RequestContext): Promise<ThemeRenderResult> {
    const theme = this.themes.get(themeId);
    if (theme === undefined) {
      return Promise.reject(
        new CoreError(ErrorCode.UNKNOWN_THEME, `theme "${themeId}" is not loaded`),
      );
    }

    return theme.mailbox.post(async () => {
      const returned: JsonValue = await theme.engine.call(`${themeId}.handle`, [
        snapshotForTheme(ctx),
      ]);
      const merged = mergeSnapshot(
        ctx,
        returned,
        themeId,
        this.logger.withContext({ theme: themeId }),
      );
      if (merged.response.body.kind === 'unset') {
        throw new CoreError(
          ErrorCode.MISSING_BODY,
          `theme "${themeId}" did not produce a response body`,
        );
      }
      return { ctx: merged, body: merged.response.body };
    });
  }

  async close(): Promise<void> {
    const engines = [...this.themes.values()].map((theme) => theme.engine.close());
    this.themes.clear();
    await Promise.all(engines);
  }
}
