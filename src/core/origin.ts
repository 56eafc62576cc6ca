/**
 * Deployment origin resolution
 *
 * Each platform exposes the public origin of the app in its own variable
 * (ORIGIN on Node, CF_PAGES_URL on Cloudflare Pages, VERCEL_URL on Vercel).
 */

import type { OriginResolution, PlatformProvider } from './types.js'
import { getPlatforms, findPlatform } from '../plugins/registry.js'

/**
 * An origin variable is set but does not hold a usable URL
 */
export class InvalidOriginError extends Error {
  readonly variable: string

  constructor(variable: string, value: string) {
    super(`${variable} is not a valid URL: "${value}"`)
    this.name = 'InvalidOriginError'
    this.variable = variable
  }
}

/**
 * Reduce a URL to its origin (scheme, host, port)
 */
export function normalizeOrigin(value: string, variable: string): string {
  let url: URL
  try {
    url = new URL(value)
  } catch {
    throw new InvalidOriginError(variable, value)
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidOriginError(variable, value)
  }

  return url.origin
}

/**
 * Pick the platform for an environment: by name, or the first whose
 * detection matches
 */
export function selectPlatform(
  env: Record<string, string | undefined>,
  platformName?: string
): PlatformProvider {
  if (platformName) {
    const platform = findPlatform(platformName)
    if (!platform) {
      const known = getPlatforms().map((p) => p.name)
      throw new Error(`Unknown platform "${platformName}" (available: ${known.join(', ') || 'none'})`)
    }
    return platform
  }

  const detected = getPlatforms().find((p) => p.detect(env))
  if (!detected) {
    throw new Error('No platform registered')
  }
  return detected
}

/**
 * Resolve the public origin of the app on the current platform
 */
export function resolveOrigin(
  env: Record<string, string | undefined>,
  platformName?: string
): OriginResolution {
  const platform = selectPlatform(env, platformName)
  const raw = platform.resolveOrigin(env)

  return {
    platform: platform.name,
    variable: platform.originVariable,
    origin: raw === null ? null : normalizeOrigin(raw, platform.originVariable),
  }
}
