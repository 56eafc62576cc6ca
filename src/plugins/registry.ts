/**
 * Plugin registry for managing loaded plugins
 */

import type {
  EnvBoundaryPlugin,
  PlatformProvider,
  PluginHooks,
  ResolvedConfig,
  LoadedEnv,
} from '../core/types.js'

/**
 * Plugin registry state
 */
interface PluginRegistryState {
  /** All loaded plugins */
  plugins: EnvBoundaryPlugin[]
  /** Aggregated platforms from all plugins */
  platforms: PlatformProvider[]
  /** Aggregated hooks from all plugins */
  hooks: PluginHooks[]
}

function emptyRegistry(): PluginRegistryState {
  return { plugins: [], platforms: [], hooks: [] }
}

/**
 * Global plugin registry
 */
let registry: PluginRegistryState = emptyRegistry()

/**
 * Register a plugin
 */
export function registerPlugin(plugin: EnvBoundaryPlugin): void {
  registry.plugins.push(plugin)

  if (plugin.platforms) {
    registry.platforms.push(...plugin.platforms)
  }

  if (plugin.hooks) {
    registry.hooks.push(plugin.hooks)
  }
}

/**
 * Register multiple plugins
 */
export function registerPlugins(plugins: EnvBoundaryPlugin[]): void {
  for (const plugin of plugins) {
    registerPlugin(plugin)
  }
}

/**
 * Get all registered plugins
 */
export function getPlugins(): EnvBoundaryPlugin[] {
  return registry.plugins
}

/**
 * Get all registered platforms
 */
export function getPlatforms(): PlatformProvider[] {
  return registry.platforms
}

/**
 * Find a platform by name
 */
export function findPlatform(name: string): PlatformProvider | undefined {
  return registry.platforms.find((p) => p.name === name)
}

/**
 * Get all registered hooks
 */
export function getHooks(): PluginHooks[] {
  return registry.hooks
}

/**
 * Clear all registered plugins
 */
export function clearRegistry(): void {
  registry = emptyRegistry()
}

/**
 * Execute onInit hooks
 */
export async function executeOnInitHooks(config: ResolvedConfig): Promise<void> {
  for (const hooks of registry.hooks) {
    if (hooks.onInit) {
      await hooks.onInit(config)
    }
  }
}

/**
 * Execute afterLoad hooks
 */
export async function executeAfterLoadHooks(env: LoadedEnv): Promise<void> {
  for (const hooks of registry.hooks) {
    if (hooks.afterLoad) {
      await hooks.afterLoad(env)
    }
  }
}

/**
 * Variables provided by platforms or declared ignorable by plugins
 */
export function getPluginIgnoreMissing(): string[] {
  const ignored: string[] = []
  for (const plugin of registry.plugins) {
    if (plugin.ignoreMissing) {
      ignored.push(...plugin.ignoreMissing)
    }
  }
  for (const platform of registry.platforms) {
    ignored.push(...platform.platformVariables)
  }
  return ignored
}

/**
 * Secret patterns contributed by plugins
 */
export function getPluginSecretPatterns(): string[] {
  const patterns: string[] = []
  for (const plugin of registry.plugins) {
    if (plugin.secretPatterns) {
      patterns.push(...plugin.secretPatterns)
    }
  }
  return patterns
}
