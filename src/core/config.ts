/**
 * Configuration loading and management using cosmiconfig
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig'
import type { EnvBoundaryConfig, PluginsConfig, ResolvedConfig, ScanningConfig } from './types.js'
import { DEFAULT_PUBLIC_PREFIX, DEFAULT_SECRET_PATTERNS, compileSecretPatterns } from './classifier.js'
import { validateMode } from './loader.js'

// =============================================================================
// Default Configuration
// =============================================================================

const DEFAULT_SCANNING_CONFIG: Required<ScanningConfig> = {
  sourceDir: 'src',
  extensions: ['.ts', '.tsx', '.js', '.jsx', '.mjs', '.cjs', '.mts', '.cts'],
  skipDirs: ['node_modules', 'dist', 'build', 'coverage', '.git'],
  serverPatterns: ['**/*.server.*', '**/server/**', '**/api/**'],
  ignoreUnused: [],
}

const DEFAULT_PLUGINS_CONFIG: PluginsConfig = {
  vercel: { enabled: false },
  cloudflarePages: { enabled: false },
  netlify: { enabled: false },
  external: [],
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  version: '1',
  publicPrefix: DEFAULT_PUBLIC_PREFIX,
  envDir: '.',
  mode: 'development',
  base: '/',
  secretPatterns: DEFAULT_SECRET_PATTERNS,
  scanning: DEFAULT_SCANNING_CONFIG,
  plugins: DEFAULT_PLUGINS_CONFIG,
}

// =============================================================================
// Configuration Loading
// =============================================================================

const MODULE_NAME = 'env-boundary'

/**
 * Create the cosmiconfig explorer
 */
async function createExplorer() {
  let TypeScriptLoader: typeof import('cosmiconfig-typescript-loader').TypeScriptLoader | undefined

  try {
    const module = await import('cosmiconfig-typescript-loader')
    TypeScriptLoader = module.TypeScriptLoader
  } catch {
    // Without the loader only JS, JSON and YAML configs are supported
    TypeScriptLoader = undefined
  }

  const searchPlaces = [
    'package.json',
    `.${MODULE_NAME}rc`,
    `.${MODULE_NAME}rc.json`,
    `.${MODULE_NAME}rc.yaml`,
    `.${MODULE_NAME}rc.yml`,
    `.${MODULE_NAME}rc.js`,
    `.${MODULE_NAME}rc.cjs`,
    `.${MODULE_NAME}rc.mjs`,
    `${MODULE_NAME}.config.js`,
    `${MODULE_NAME}.config.cjs`,
    `${MODULE_NAME}.config.mjs`,
    `${MODULE_NAME}.config.ts`,
    `${MODULE_NAME}.config.mts`,
    `${MODULE_NAME}.config.cts`,
  ]

  if (TypeScriptLoader) {
    return cosmiconfig(MODULE_NAME, {
      searchPlaces,
      loaders: {
        '.ts': TypeScriptLoader(),
        '.mts': TypeScriptLoader(),
        '.cts': TypeScriptLoader(),
      },
    })
  }

  return cosmiconfig(MODULE_NAME, { searchPlaces })
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Merge user config with defaults (sections are merged one level deep)
 */
export function mergeWithDefaults(userConfig: EnvBoundaryConfig): ResolvedConfig {
  return {
    version: userConfig.version ?? DEFAULT_CONFIG.version,
    publicPrefix: userConfig.publicPrefix ?? DEFAULT_CONFIG.publicPrefix,
    envDir: userConfig.envDir ?? DEFAULT_CONFIG.envDir,
    mode: userConfig.mode ?? DEFAULT_CONFIG.mode,
    base: userConfig.base ?? DEFAULT_CONFIG.base,
    secretPatterns: userConfig.secretPatterns ?? DEFAULT_CONFIG.secretPatterns,
    scanning: { ...DEFAULT_SCANNING_CONFIG, ...userConfig.scanning },
    plugins: {
      vercel: { ...DEFAULT_PLUGINS_CONFIG.vercel, ...userConfig.plugins?.vercel },
      cloudflarePages: {
        ...DEFAULT_PLUGINS_CONFIG.cloudflarePages,
        ...userConfig.plugins?.cloudflarePages,
      },
      netlify: { ...DEFAULT_PLUGINS_CONFIG.netlify, ...userConfig.plugins?.netlify },
      external: userConfig.plugins?.external ?? [],
    },
  }
}

/**
 * Throw if a resolved config cannot be used
 */
export function validateConfig(config: ResolvedConfig): void {
  if (!config.publicPrefix) {
    throw new Error('publicPrefix must not be empty')
  }
  validateMode(config.mode)
  compileSecretPatterns(config.secretPatterns)
}

/**
 * Load configuration result
 */
export interface LoadConfigResult {
  /** The merged configuration */
  config: ResolvedConfig
  /** Path to the config file (if found) */
  filepath: string | null
  /** Whether a config file was found */
  found: boolean
}

function toLoadResult(result: CosmiconfigResult, fallbackPath: string | null): LoadConfigResult {
  if (result === null || result.isEmpty) {
    return { config: DEFAULT_CONFIG, filepath: fallbackPath, found: false }
  }

  const userConfig: EnvBoundaryConfig = result.config
  if (!isPlainObject(userConfig)) {
    throw new Error(`Invalid env-boundary config in ${result.filepath}: expected an object`)
  }

  const config = mergeWithDefaults(userConfig)
  validateConfig(config)

  return { config, filepath: result.filepath, found: true }
}

/**
 * Load configuration from the filesystem
 *
 * @param searchFrom - Directory to start searching from (default: cwd)
 */
export async function loadConfig(searchFrom?: string): Promise<LoadConfigResult> {
  const explorer = await createExplorer()

  let result: CosmiconfigResult = null

  try {
    result = searchFrom ? await explorer.search(searchFrom) : await explorer.search()
  } catch (error) {
    throw new Error(
      `Failed to load env-boundary config: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  return toLoadResult(result, null)
}

/**
 * Load configuration from a specific file
 */
export async function loadConfigFromFile(filepath: string): Promise<LoadConfigResult> {
  const explorer = await createExplorer()

  let result: CosmiconfigResult = null

  try {
    result = await explorer.load(filepath)
  } catch (error) {
    throw new Error(
      `Failed to load env-boundary config from ${filepath}: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  return toLoadResult(result, filepath)
}

// =============================================================================
// Config Helper
// =============================================================================

/**
 * Define an env-boundary configuration with type checking
 *
 * @example
 * ```ts
 * // env-boundary.config.ts
 * import { defineConfig } from 'env-boundary'
 *
 * export default defineConfig({
 *   base: '/app/',
 *   plugins: { vercel: { enabled: true } },
 * })
 * ```
 */
export function defineConfig(config: EnvBoundaryConfig): EnvBoundaryConfig {
  return config
}
