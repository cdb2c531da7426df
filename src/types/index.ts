export {
  type JsonPrimitive,
  type JsonValue,
  type JsonObject,
  isJsonObject,
  isRecord,
} from './json.js';

export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorPayload,
  ERROR_RECOVERABLE,
  isErrorCode,
} from './errors.js';

export {
  type ContentKind,
  type ResolvedContent,
  type ResponseBodySpec,
  type ResponseBodyKind,
  type ResponseHeaders,
  type ResponseSpec,
  type RequestContext,
  EMPTY_CONTENT,
  DEFAULT_STATUS,
  emptyResponseSpec,
} from './context.js';

export {
  type HeaderPatchKind,
  type HeaderPatch,
  type ModelPatch,
  type DomOp,
  type DomOpKind,
  type RegexPatch,
  type HtmlDomPatch,
  type JsonPatchPatch,
  type BodyPatch,
  type Recommendations,
  EMPTY_RECOMMENDATIONS,
  appendRecommendations,
} from './recommendations.js';

export {
  type PluginManifest,
  type ThemeManifest,
  DEFAULT_PLUGIN_MAIN,
  DEFAULT_THEME_MAIN,
  DEFAULT_TEMPLATES_DIR,
  SCRIPT_ID_PATTERN,
  isValidScriptId,
} from './manifest.js';

export { PLUGIN_MANIFEST_SCHEMA, THEME_MANIFEST_SCHEMA } from './manifest-schema.js';

export {
  type ServerConfig,
  type PluginsConfig,
  type BreakerConfig,
  type RenderConfig,
  type ThemeMountConfig,
  type ThemesConfig,
  type ScriptIsolation,
  type ScriptingConfig,
  type LoggingConfig,
  type PlinthConfig,
  DEFAULT_CONFIG,
  defaultConfig,
  resolveHome,
  parseConfig,
} from './config.js';
