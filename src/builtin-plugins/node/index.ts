/**
 * Node bundled plugin
 *
 * A self-hosted Node server learns its public origin from ORIGIN.
 */

import type { EnvBoundaryPlugin, PlatformProvider } from '../../core/types.js'

const NODE_PLATFORM_VARIABLES = ['ORIGIN', 'PORT', 'HOST', 'NODE_ENV']

/**
 * Node platform. Matches any environment, so it is consulted last.
 */
export const nodePlatform: PlatformProvider = {
  name: 'node',
  originVariable: 'ORIGIN',
  detect: () => true,
  resolveOrigin: (env) => env.ORIGIN || null,
  platformVariables: NODE_PLATFORM_VARIABLES,
}

/**
 * Create the Node plugin
 */
export function createNodePlugin(): EnvBoundaryPlugin {
  return {
    meta: {
      name: 'env-boundary-plugin-node',
      version: '1.0.0',
      description: 'Origin resolution for self-hosted Node servers',
    },
    platforms: [nodePlatform],
  }
}
