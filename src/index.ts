/**
 * env-boundary - Public/private environment variables for server-rendered apps
 *
 * @packageDocumentation
 */

// Core types
export type {
  EnvVisibility,
  PartitionedEnv,
  BuiltinName,
  BuiltinEnv,
  BuildTarget,
  EnvFile,
  EnvValueSource,
  LoadedEnv,
  EnvUsage,
  OriginResolution,
  ExportFormat,
} from './core/types.js'

// Plugin types
export type {
  EnvBoundaryPlugin,
  PluginMeta,
  PluginHooks,
  PlatformProvider,
} from './core/types.js'

// Config types
export type {
  EnvBoundaryConfig,
  ResolvedConfig,
  ScanningConfig,
  PluginsConfig,
  PlatformPluginConfig,
  ExternalPluginRef,
} from './core/types.js'

// Config utilities
export {
  defineConfig,
  loadConfig,
  loadConfigFromFile,
  mergeWithDefaults,
  validateConfig,
  DEFAULT_CONFIG,
} from './core/config.js'

// Classification
export {
  DEFAULT_PUBLIC_PREFIX,
  DEFAULT_SECRET_PATTERNS,
  RESERVED_NAMES,
  classifyVariable,
  isPublicVariable,
  isReservedName,
  partitionEnv,
  findSecretLikePublicVariables,
} from './core/classifier.js'

// Env files
export {
  parseEnvContent,
  parseEnvFile,
  expandEnvValues,
  formatEnvFile,
  quoteEnvValue,
} from './core/parser.js'
export { loadEnv, getEnvFilePaths, validateMode } from './core/loader.js'
export type { LoadEnvOptions } from './core/loader.js'

// Build time
export { createBuiltinEnv, normalizeBase } from './core/builtins.js'
export type { BuiltinEnvOptions } from './core/builtins.js'
export { createDefineMap, inlineEnv } from './core/inliner.js'
export type { InlineSources, InlineOptions, InlineResult, PrivateReference } from './core/inliner.js'
export { generateEnvDeclarations } from './core/declarations.js'

// Source scanning
export {
  scanSources,
  mergeScanResults,
  diagnoseEnvUsage,
  extractEnvUsages,
} from './core/source-scanner.js'
export type { SourceScanResult, DiagnoseResult } from './core/source-scanner.js'

// Project discovery
export { detectProjectRoot, resolveEnvDir, resolveSourceDir } from './core/scanner.js'

// Origin
export { resolveOrigin, selectPlatform, normalizeOrigin, InvalidOriginError } from './core/origin.js'

// Request-time access
export {
  createRequestEnv,
  requireEnv,
  runWithRequestEnv,
  getRequestEnv,
  MissingEnvVariableError,
  ServerOnlyError,
} from './runtime/index.js'
export type { RequestEnv, RequestEnvSource } from './runtime/index.js'

// Plugin infrastructure
export {
  registerPlugin,
  registerPlugins,
  getPlugins,
  getPlatforms,
  findPlatform,
  getHooks,
  clearRegistry,
  executeOnInitHooks,
  executeAfterLoadHooks,
} from './plugins/registry.js'

export { loadPlugins, createPlugin } from './plugins/loader.js'

// Bundled plugins
export { createNodePlugin, nodePlatform } from './builtin-plugins/node/index.js'
export { createVercelPlugin, vercelPlatform } from './builtin-plugins/vercel/index.js'
export {
  createCloudflarePagesPlugin,
  cloudflarePagesPlatform,
} from './builtin-plugins/cloudflare-pages/index.js'
export { createNetlifyPlugin, netlifyPlatform } from './builtin-plugins/netlify/index.js'

// Reporter (selected exports for programmatic use)
export { setColorsEnabled } from './core/reporter.js'
