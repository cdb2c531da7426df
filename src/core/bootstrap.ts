/**
 * Bootstrap: turns a home directory and its config into a running
 * request processor.
 *
 *   discover plugins and themes
 *     → pick plugin order, check theme mounts
 *     → load plugins into one engine, each mounted theme into its own
 *     → load theme templates
 *     → init plugins and themes
 *     → assemble middleware, dispatcher, pipeline and processor
 *
 * Any failure before the processor exists closes whatever engines were
 * already spawned and rethrows.
 */

import type { PlinthConfig, ScriptingConfig } from '../types/config.js';
import { EMPTY_CONTENT } from '../types/context.js';
import type { RequestContext } from '../types/context.js';
import { ErrorCode } from '../types/errors.js';
import { InlineEngineClient } from '../script/engine-client.js';
import type { EngineFactory } from '../script/engine-client.js';
import { ThreadEngineClient } from '../script/engine-thread.js';
import { PluginActor } from '../runtime/plugin-actor.js';
import { ThemeActor } from '../runtime/theme-actor.js';
import { TemplateRegistry } from '../render/template.js';
import { BodyRenderPipeline } from '../render/pipeline.js';
import { CoreError } from './core-error.js';
import { resolvePaths } from './config-loader.js';
import type { RuntimePaths } from './config-loader.js';
import { discoverPlugins, discoverThemes } from './discovery.js';
import type { DiscoveredPlugin, DiscoveredTheme } from './discovery.js';
import { createContextBuilder } from './context-builder.js';
import type { ContextBuilder } from './context-builder.js';
import { FileContentResolver } from './content-resolver.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { PluginMiddleware } from './plugin-middleware.js';
import { ThemeDispatcher } from './theme-dispatcher.js';
import { RequestProcessor } from './request-processor.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BootstrapOptions {
  home: string;
  config: PlinthConfig;
  /** Replaces the factory chosen by `scripting.isolation`. */
  engineFactory?: EngineFactory;
  logger?: Logger;
  now?: () => number;
}

export interface Runtime {
  paths: RuntimePaths;
  processor: RequestProcessor;
  /** Plugin ids in execution order. */
  pluginOrder: readonly string[];
  /** Loaded theme ids. */
  themes: readonly string[];
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/**
 * The configured order, or every discovered id sorted when none is set.
 *
 * @throws CoreError PLUGIN_BOOTSTRAP when the order names an undiscovered plugin
 */
export function selectPluginOrder(
  discovered: readonly string[],
  order: readonly string[],
): string[] {
  if (order.length === 0) {
    return [...discovered].sort();
  }
  const known = new Set(discovered);
  for (const id of order) {
    if (!known.has(id)) {
      throw new CoreError(
        ErrorCode.PLUGIN_BOOTSTRAP,
        `plugins.order names "${id}", which was not found`,
      );
    }
  }
  return [...order];
}

/**
 * Discovered themes named by a mount, in mount order, each once.
 *
 * @throws CoreError THEME_BOOTSTRAP when a mount names an undiscovered theme
 */
export function selectMountedThemes(
  discovered: readonly DiscoveredTheme[],
  mounts: PlinthConfig['themes']['mounts'],
): DiscoveredTheme[] {
  const byId = new Map(discovered.map((theme) => [theme.script.id, theme]));
  const selected = new Map<string, DiscoveredTheme>();
  for (const mount of mounts) {
    const theme = byId.get(mount.theme_id);
    if (theme === undefined) {
      throw new CoreError(
        ErrorCode.THEME_BOOTSTRAP,
        `mount ${mount.mount_path} names theme "${mount.theme_id}", which was not found`,
      );
    }
    selected.set(mount.theme_id, theme);
  }
  return [...selected.values()];
}

export function engineFactoryFor(scripting: ScriptingConfig): EngineFactory {
  if (scripting.isolation === 'inline') {
    return (name) => new InlineEngineClient({ name, maxRunMs: scripting.max_run_ms });
  }
  return (name) => new ThreadEngineClient({ name, maxRunMs: scripting.max_run_ms });
}

/** Context handed to `init` hooks before any request exists. */
export function startupContext(buildContext: ContextBuilder): RequestContext {
  return buildContext(
    { path: '/', method: 'GET', version: 'HTTP/1.1', headers: {}, query: {} },
    EMPTY_CONTENT,
  );
}

// ---------------------------------------------------------------------------
// bootstrap()
// ---------------------------------------------------------------------------

/**
 * @throws CoreError PLUGIN_BOOTSTRAP or THEME_BOOTSTRAP on discovery,
 *   selection or load failures; TEMPLATE for a template that does not parse
 */
export async function bootstrap(options: BootstrapOptions): Promise<Runtime> {
  const { home, config } = options;
  const logger = options.logger ?? createLogger('bootstrap');
  const paths = resolvePaths(home, config);
  const engineFactory = options.engineFactory ?? engineFactoryFor(config.scripting);

  const discoveredPlugins = await discoverPlugins(paths.pluginsDir);
  const discoveredThemes = await discoverThemes(paths.themesDir);
  const pluginOrder = selectPluginOrder(
    discoveredPlugins.map((plugin) => plugin.script.id),
    config.plugins.order,
  );
  const mountedThemes = selectMountedThemes(discoveredThemes, config.themes.mounts);

  const pluginActor = new PluginActor({ engine: engineFactory('plugins'), now: options.now });
  const themeActor = new ThemeActor({ engineFactory });
  const close = async (): Promise<void> => {
    await Promise.all([pluginActor.close(), themeActor.close()]);
  };

  try {
    await loadPlugins(pluginActor, discoveredPlugins, pluginOrder);
    const templates = new Map<string, TemplateRegistry>();
    for (const theme of mountedThemes) {
      await themeActor.load(theme.script);
      const registry = await TemplateRegistry.fromDirectory(theme.templatesDir);
      templates.set(theme.script.id, registry);
      logger.debug('theme templates loaded', {
        theme: theme.script.id,
        templates: registry.names,
      });
    }

    const buildContext = createContextBuilder({ pluginConfigs: config.plugin_config });
    const initCtx = startupContext(buildContext);
    await pluginActor.initAll(initCtx);
    await themeActor.initAll(initCtx, config.theme_config);

    const breaker = new CircuitBreaker(
      {
        windowMs: config.breaker.window_sec * 1000,
        maxFailures: config.breaker.max_failures,
        openMs: config.breaker.open_sec * 1000,
      },
      options.now,
    );
    const processor = new RequestProcessor({
      resolver: new FileContentResolver({ root: paths.contentDir }),
      buildContext,
      middleware: new PluginMiddleware({
        runner: pluginActor,
        order: pluginOrder,
        breaker,
        timeoutMs: config.plugins.timeout_ms,
        now: options.now,
      }),
      dispatcher: new ThemeDispatcher({
        renderer: themeActor,
        mounts: config.themes.mounts.map((mount) => ({
          mountPath: mount.mount_path,
          themeId: mount.theme_id,
        })),
        themeConfigs: config.theme_config,
      }),
      pipeline: new BodyRenderPipeline({ tailWindow: config.render.regex_tail_window }),
      templates,
      now: options.now,
    });

    logger.info('runtime ready', {
      plugins: pluginOrder,
      themes: themeActor.ids,
      isolation: config.scripting.isolation,
    });
    return { paths, processor, pluginOrder, themes: themeActor.ids, close };
  } catch (err) {
    await close();
    throw err;
  }
}

async function loadPlugins(
  actor: PluginActor,
  discovered: readonly DiscoveredPlugin[],
  order: readonly string[],
): Promise<void> {
  const byId = new Map(discovered.map((plugin) => [plugin.script.id, plugin]));
  for (const id of order) {
    const plugin = byId.get(id);
    if (plugin !== undefined) {
      await actor.load(plugin.script);
    }
  }
}
