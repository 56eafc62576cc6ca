/**
 * Plugin loader for discovering and loading plugins
 */

import type { EnvBoundaryPlugin, EnvBoundaryConfig } from '../core/types.js'
import { registerPlugin, clearRegistry } from './registry.js'
import * as reporter from '../core/reporter.js'

import { createNodePlugin } from '../builtin-plugins/node/index.js'
import { createVercelPlugin } from '../builtin-plugins/vercel/index.js'
import { createCloudflarePagesPlugin } from '../builtin-plugins/cloudflare-pages/index.js'
import { createNetlifyPlugin } from '../builtin-plugins/netlify/index.js'

/**
 * Load plugins based on configuration
 */
export async function loadPlugins(config: EnvBoundaryConfig): Promise<EnvBoundaryPlugin[]> {
  clearRegistry()

  const pluginsConfig = config.plugins || {}
  const loadedPlugins: EnvBoundaryPlugin[] = []

  const use = (plugin: EnvBoundaryPlugin): void => {
    registerPlugin(plugin)
    loadedPlugins.push(plugin)
  }

  // Platform-specific plugins go first: node matches everything
  if (pluginsConfig.vercel?.enabled) {
    use(createVercelPlugin())
  }

  if (pluginsConfig.cloudflarePages?.enabled) {
    use(createCloudflarePagesPlugin())
  }

  if (pluginsConfig.netlify?.enabled) {
    use(createNetlifyPlugin())
  }

  if (pluginsConfig.external) {
    for (const externalRef of pluginsConfig.external) {
      try {
        const externalPlugin = await loadExternalPlugin(externalRef.name, externalRef.options)
        if (externalPlugin) {
          use(externalPlugin)
        }
      } catch (error) {
        reporter.printWarning(
          `Failed to load external plugin "${externalRef.name}": ${error instanceof Error ? error.message : String(error)}`
        )
      }
    }
  }

  use(createNodePlugin())

  return loadedPlugins
}

function isPlugin(value: unknown): value is EnvBoundaryPlugin {
  return typeof value === 'object' && value !== null && 'meta' in value
}

/**
 * Load an external plugin by module name or path
 */
async function loadExternalPlugin(
  name: string,
  options?: Record<string, unknown>
): Promise<EnvBoundaryPlugin | null> {
  const module: Record<string, unknown> = await import(name)

  const factory = typeof module.createPlugin === 'function' ? module.createPlugin : module.default

  if (typeof factory === 'function') {
    const plugin: unknown = factory(options)
    if (isPlugin(plugin)) {
      return plugin
    }
  } else if (isPlugin(factory)) {
    return factory
  }

  reporter.printWarning(`Plugin "${name}" does not export a valid plugin`)
  return null
}

/**
 * Create a plugin from its parts
 */
export function createPlugin(
  meta: EnvBoundaryPlugin['meta'],
  options: Omit<EnvBoundaryPlugin, 'meta'>
): EnvBoundaryPlugin {
  return {
    meta,
    ...options,
  }
}
