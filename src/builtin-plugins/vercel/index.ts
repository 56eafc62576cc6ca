/**
 * Vercel bundled plugin
 *
 * Vercel injects the deployment host (without scheme) as VERCEL_URL.
 */

import type { EnvBoundaryPlugin, PlatformProvider } from '../../core/types.js'

/**
 * Vercel platform variables (auto-injected by Vercel)
 */
const VERCEL_PLATFORM_VARIABLES = [
  'VERCEL',
  'VERCEL_ENV',
  'VERCEL_URL',
  'VERCEL_BRANCH_URL',
  'VERCEL_PROJECT_PRODUCTION_URL',
  'VERCEL_REGION',
  'VERCEL_GIT_COMMIT_SHA',
  'VERCEL_GIT_COMMIT_REF',
  'VERCEL_GIT_PROVIDER',
  'VERCEL_GIT_REPO_SLUG',
]

export const vercelPlatform: PlatformProvider = {
  name: 'vercel',
  originVariable: 'VERCEL_URL',
  detect: (env) => !!env.VERCEL,
  resolveOrigin: (env) => {
    const host = env.VERCEL_URL
    if (!host) {
      return null
    }
    return /^https?:\/\//i.test(host) ? host : `https://${host}`
  },
  platformVariables: VERCEL_PLATFORM_VARIABLES,
}

/**
 * Create the Vercel plugin
 */
export function createVercelPlugin(): EnvBoundaryPlugin {
  return {
    meta: {
      name: 'env-boundary-plugin-vercel',
      version: '1.0.0',
      description: 'Origin resolution and platform variables for Vercel',
    },
    platforms: [vercelPlatform],
  }
}
