/**
 * env-boundary core type definitions
 */

// =============================================================================
// Classification Types
// =============================================================================

/**
 * Which side of the boundary a variable lives on.
 *
 * `public` variables are inlined at build time into server and client
 * artifacts. `private` variables are only read on the server at request time.
 */
export type EnvVisibility = 'public' | 'private'

/**
 * Environment split into its two disjoint halves
 */
export interface PartitionedEnv {
  public: Record<string, string>
  private: Record<string, string>
}

/**
 * Names the framework reserves for its own constants
 */
export type BuiltinName = 'BASE_URL' | 'MODE' | 'DEV' | 'PROD' | 'SSR'

/**
 * Framework-provided constants, available as `import.meta.env.*`
 */
export interface BuiltinEnv {
  /** Public base path the app is served from, always ending in `/` */
  BASE_URL: string
  /** Mode the app was built or started in (e.g. 'development') */
  MODE: string
  DEV: boolean
  PROD: boolean
  /** True in the server build, false in the client build */
  SSR: boolean
}

/**
 * Build output a value gets inlined into
 */
export type BuildTarget = 'client' | 'server'

// =============================================================================
// Env File Types
// =============================================================================

/**
 * A parsed env file
 */
export interface EnvFile {
  /** Absolute path of the file */
  filePath: string
  /** Whether the file was found on disk */
  exists: boolean
  /** Variable name -> value */
  values: Map<string, string>
}

/**
 * Where a loaded value came from: an env file path, or the process environment
 */
export type EnvValueSource = string | 'process'

/**
 * Result of loading the environment for one mode
 */
export interface LoadedEnv {
  /** Mode the files were selected for */
  mode: string
  /** All loaded values after overrides and expansion */
  values: Map<string, string>
  /** Variable name -> origin of its final value */
  sources: Map<string, EnvValueSource>
  /** Env files in load order (only those that exist) */
  files: string[]
  /** Values split by the public prefix */
  partition: PartitionedEnv
  /** Reserved names that were defined in env files and will be shadowed */
  shadowedReserved: string[]
}

// =============================================================================
// Source Scanning Types
// =============================================================================

/**
 * One reference to an env variable in source code
 */
export interface EnvUsage {
  /** File path relative to the project root */
  file: string
  /** 1-based line number */
  line: number
  /** The matched expression, e.g. `import.meta.env.API_KEY` */
  pattern: string
  /** Whether the file only runs on the server */
  serverOnly: boolean
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Source code scanning configuration
 */
export interface ScanningConfig {
  /** Directory containing application sources (default: 'src') */
  sourceDir?: string
  /** File extensions to scan */
  extensions?: string[]
  /** Directories to skip */
  skipDirs?: string[]
  /** Globs (relative to sourceDir) of files that never reach the client */
  serverPatterns?: string[]
  /** Variables to ignore when checking for unused */
  ignoreUnused?: string[]
}

/**
 * Toggle for a bundled platform plugin
 */
export interface PlatformPluginConfig {
  enabled?: boolean
}

/**
 * External plugin reference
 */
export interface ExternalPluginRef {
  /** Plugin package name or path */
  name: string
  /** Plugin-specific options */
  options?: Record<string, unknown>
}

/**
 * Plugins configuration
 */
export interface PluginsConfig {
  vercel?: PlatformPluginConfig
  cloudflarePages?: PlatformPluginConfig
  netlify?: PlatformPluginConfig
  external?: ExternalPluginRef[]
}

/**
 * Main configuration object
 */
export interface EnvBoundaryConfig {
  /** Config version */
  version?: '1'
  /** Prefix marking a variable as public (default: 'PUBLIC_') */
  publicPrefix?: string
  /** Directory holding the .env files, relative to the project root */
  envDir?: string
  /** Default mode when none is passed on the command line */
  mode?: string
  /** Public base path of the app */
  base?: string
  /** Regex sources flagging a public variable name as secret-looking */
  secretPatterns?: string[]
  /** Source code scanning configuration */
  scanning?: ScanningConfig
  /** Plugin configuration */
  plugins?: PluginsConfig
}

/**
 * Configuration with every top-level section filled in
 */
export type ResolvedConfig = Required<EnvBoundaryConfig> & {
  scanning: Required<ScanningConfig>
}

// =============================================================================
// Platform Types
// =============================================================================

/**
 * Deployment platform knowledge: how to recognise it and where it puts the
 * public origin of the app
 */
export interface PlatformProvider {
  /** Platform name (e.g., 'vercel') */
  name: string
  /** Variable holding the deployment origin */
  originVariable: string
  /** Whether the given environment looks like this platform */
  detect: (env: Record<string, string | undefined>) => boolean
  /** Turn the raw variable value into a URL string, or null when unset */
  resolveOrigin: (env: Record<string, string | undefined>) => string | null
  /** Variables injected by the platform itself */
  platformVariables: string[]
}

/**
 * Result of origin resolution
 */
export interface OriginResolution {
  platform: string
  variable: string
  /** Normalized origin (scheme + host + port), or null when unset */
  origin: string | null
}

// =============================================================================
// Plugin Types
// =============================================================================

/**
 * Plugin metadata
 */
export interface PluginMeta {
  name: string
  version: string
  description?: string
}

/**
 * Plugin lifecycle hooks
 */
export interface PluginHooks {
  /** Called once config is loaded and plugins are registered */
  onInit?: (config: ResolvedConfig) => Promise<void> | void
  /** Called after the environment for a mode has been loaded */
  afterLoad?: (env: LoadedEnv) => Promise<void> | void
}

/**
 * Plugin interface
 */
export interface EnvBoundaryPlugin {
  meta: PluginMeta
  /** Deployment platforms this plugin knows about */
  platforms?: PlatformProvider[]
  hooks?: PluginHooks
  /** Variables that are never reported (platform-provided vars) */
  ignoreMissing?: string[]
  /** Extra secret-looking name patterns */
  secretPatterns?: string[]
}

// =============================================================================
// Command Types
// =============================================================================

/**
 * Output formats for the export command
 */
export type ExportFormat = 'shell' | 'json' | 'dotenv'
