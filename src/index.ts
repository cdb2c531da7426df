/**
 * plinth: request-processing core for a scriptable CMS.
 *
 * Public surface for embedding the runtime: bootstrap it from a home
 * directory, or assemble the pieces by hand.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export { CoreError, isCoreError, errorMessage, toCoreError } from './core/core-error.js';
export {
  type LogLevel,
  type LogEntry,
  type LogSink,
  type Logger,
  configureLogging,
  resetLogging,
  createLogger,
  createTeeSink,
  createFileLogSink,
} from './core/logger.js';
export { loadConfig, resolvePaths, type RuntimePaths } from './core/config-loader.js';

export { ScriptEngine, type ScriptEngineOptions } from './script/engine.js';
export {
  type EngineClient,
  type EngineFactory,
  InlineEngineClient,
} from './script/engine-client.js';
export { ThreadEngineClient } from './script/engine-thread.js';

export {
  type ContentResolver,
  FileContentResolver,
  fallbackResolver,
} from './core/content-resolver.js';
export {
  type RequestParts,
  type ContextBuilder,
  createContextBuilder,
} from './core/context-builder.js';
export { PluginActor, type ScriptSource } from './runtime/plugin-actor.js';
export { ThemeActor, type ThemeRenderResult } from './runtime/theme-actor.js';
export { CircuitBreaker, type CircuitBreakerConfig } from './core/circuit-breaker.js';
export { PluginMiddleware } from './core/plugin-middleware.js';
export { ThemeDispatcher, type ThemeMount } from './core/theme-dispatcher.js';
export { applyRecommendations } from './core/patch-applicator.js';
export { TemplateRegistry } from './render/template.js';
export { BodyRenderPipeline, type RenderedBody } from './render/pipeline.js';
export { buildResponse, type ResponseParts } from './core/response-builder.js';
export { RequestProcessor } from './core/request-processor.js';
export { HttpServer, type RequestHandler } from './core/http-server.js';
export { discoverPlugins, discoverThemes } from './core/discovery.js';
export { bootstrap, type BootstrapOptions, type Runtime } from './core/bootstrap.js';
