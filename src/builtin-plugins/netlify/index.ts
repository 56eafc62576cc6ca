/**
 * Netlify bundled plugin
 */

import type { EnvBoundaryPlugin, PlatformProvider } from '../../core/types.js'

const NETLIFY_PLATFORM_VARIABLES = [
  'NETLIFY',
  'URL',
  'DEPLOY_URL',
  'DEPLOY_PRIME_URL',
  'CONTEXT',
  'BRANCH',
  'COMMIT_REF',
]

export const netlifyPlatform: PlatformProvider = {
  name: 'netlify',
  originVariable: 'URL',
  detect: (env) => !!env.NETLIFY,
  resolveOrigin: (env) => env.URL || null,
  platformVariables: NETLIFY_PLATFORM_VARIABLES,
}

/**
 * Create the Netlify plugin
 */
export function createNetlifyPlugin(): EnvBoundaryPlugin {
  return {
    meta: {
      name: 'env-boundary-plugin-netlify',
      version: '1.0.0',
      description: 'Origin resolution and platform variables for Netlify',
    },
    platforms: [netlifyPlatform],
  }
}
