/**
 * Framework constants exposed next to the public variables
 */

import type { BuiltinEnv } from './types.js'

export interface BuiltinEnvOptions {
  /** Public base path, e.g. '/docs/' or 'https://cdn.example.com/app' */
  base?: string
  mode: string
  /** Whether the code being built runs on the server */
  ssr: boolean
}

const ABSOLUTE_URL_PATTERN = /^https?:\/\//i

/**
 * Normalize a base path so that it always ends with a slash
 */
export function normalizeBase(base?: string): string {
  if (!base || base === '/') {
    return '/'
  }

  if (base === './' || base === '.') {
    return './'
  }

  if (ABSOLUTE_URL_PATTERN.test(base)) {
    return base.endsWith('/') ? base : `${base}/`
  }

  let normalized = base.startsWith('/') ? base : `/${base}`
  if (!normalized.endsWith('/')) {
    normalized += '/'
  }
  return normalized
}

/**
 * Create the framework constants for one build
 */
export function createBuiltinEnv(options: BuiltinEnvOptions): BuiltinEnv {
  const prod = options.mode === 'production'

  return {
    BASE_URL: normalizeBase(options.base),
    MODE: options.mode,
    DEV: !prod,
    PROD: prod,
    SSR: options.ssr,
  }
}
