/**
 * Theme dispatcher: picks the theme mounted at the longest path prefix
 * and asks the theme actor to render.
 *
 * Prefixes match whole segments: `/blog` covers `/blog` and `/blog/x`
 * but not `/blogger`. `/` covers every path. Equal-length mounts keep
 * their registration order.
 */

import type { JsonObject } from '../types/json.js';
import type { RequestContext } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import { CoreError } from './core-error.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { ThemeRenderResult } from '../runtime/theme-actor.js';

export interface ThemeMount {
  mountPath: string;
  themeId: string;
}

/** What the dispatcher needs from the theme actor. */
export interface ThemeRenderer {
  render(themeId: string, ctx: RequestContext): Promise<ThemeRenderResult>;
}

export interface ThemeDispatcherOptions {
  renderer: ThemeRenderer;
  mounts: readonly ThemeMount[];
  /** `[theme_config.<id>]` tables. */
  themeConfigs?: Readonly<Record<string, JsonObject>>;
  logger?: Logger;
}

export interface DispatchResult extends ThemeRenderResult {
  themeId: string;
}

/** Strip a trailing slash, keeping `/` itself. */
function trimMount(path: string): string {
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}

export function mountMatches(mountPath: string, path: string): boolean {
  const mount = trimMount(mountPath);
  if (mount === '/') return true;
  return path === mount || path.startsWith(`${mount}/`);
}

/** The mount with the longest matching prefix; the first registered wins ties. */
export function selectMount(mounts: readonly ThemeMount[], path: string): ThemeMount | null {
  let best: ThemeMount | null = null;
  for (const mount of mounts) {
    if (!mountMatches(mount.mountPath, path)) continue;
    if (best === null || trimMount(mount.mountPath).length > trimMount(best.mountPath).length) {
      best = mount;
    }
  }
  return best;
}

export class ThemeDispatcher {
  private readonly renderer: ThemeRenderer;
  private readonly mounts: readonly ThemeMount[];
  private readonly themeConfigs: Readonly<Record<string, JsonObject>>;
  private readonly logger: Logger;

  constructor(options: ThemeDispatcherOptions) {
    this.renderer = options.renderer;
    this.mounts = [...options.mounts];
    this.themeConfigs = options.themeConfigs ?? {};
    this.logger = options.logger ?? createLogger('dispatcher');
  }

  /** The theme id serving `path`, or null when no mount covers it. */
  themeFor(path: string): string | null {
    return selectMount(this.mounts, path)?.themeId ?? null;
  }

  /**
   * Render `ctx` with the theme mounted for its path. The selected
   * theme's config replaces `ctx.themeConfig` first.
   *
   * @throws CoreError UNKNOWN_THEME when no mount covers the path, or
   *   whatever the theme actor throws
   */
  async dispatch(ctx: RequestContext): Promise<DispatchResult> {
    const themeId = this.themeFor(ctx.path);
    if (themeId === null) {
      throw new CoreError(ErrorCode.UNKNOWN_THEME, `no theme is mounted for ${ctx.path}`);
    }
    const themeConfig = Object.hasOwn(this.themeConfigs, themeId)
      ? this.themeConfigs[themeId]
      : ctx.themeConfig;

    this.logger.debug('theme selected', { request: ctx.requestId, theme: themeId });
    const result = await this.renderer.render(themeId, { ...ctx, themeConfig });
    return { themeId, ...result };
  }
}
