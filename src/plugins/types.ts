/**
 * Plugin type definitions
 *
 * Re-exports from core types for plugin authors
 */

export type {
  EnvBoundaryPlugin,
  PluginMeta,
  PluginHooks,
  PlatformProvider,
  LoadedEnv,
  ResolvedConfig,
  EnvBoundaryConfig,
} from '../core/types.js'
