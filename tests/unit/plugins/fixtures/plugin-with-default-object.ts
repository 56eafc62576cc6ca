/**
 * Test plugin that exports a default object with a platform
 */
import type { EnvBoundaryPlugin } from '@/core/types.js'

const plugin: EnvBoundaryPlugin = {
  meta: {
    name: 'default-object-test',
    version: '1.0.0',
    description: 'Test plugin with default object export',
  },
  platforms: [
    {
      name: 'render',
      originVariable: 'RENDER_EXTERNAL_URL',
      detect: (env) => !!env.RENDER,
      resolveOrigin: (env) => env.RENDER_EXTERNAL_URL || null,
      platformVariables: ['RENDER', 'RENDER_EXTERNAL_URL'],
    },
  ],
}

export default plugin
