/**
 * Cloudflare Pages bundled plugin
 */

import type { EnvBoundaryPlugin, PlatformProvider } from '../../core/types.js'

const CF_PAGES_PLATFORM_VARIABLES = [
  'CF_PAGES',
  'CF_PAGES_URL',
  'CF_PAGES_BRANCH',
  'CF_PAGES_COMMIT_SHA',
]

export const cloudflarePagesPlatform: PlatformProvider = {
  name: 'cloudflare-pages',
  originVariable: 'CF_PAGES_URL',
  detect: (env) => !!env.CF_PAGES,
  resolveOrigin: (env) => env.CF_PAGES_URL || null,
  platformVariables: CF_PAGES_PLATFORM_VARIABLES,
}

/**
 * Create the Cloudflare Pages plugin
 */
export function createCloudflarePagesPlugin(): EnvBoundaryPlugin {
  return {
    meta: {
      name: 'env-boundary-plugin-cloudflare-pages',
      version: '1.0.0',
      description: 'Origin resolution and platform variables for Cloudflare Pages',
    },
    platforms: [cloudflarePagesPlatform],
  }
}
