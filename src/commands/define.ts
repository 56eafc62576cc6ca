/**
 * Define command - Print the build-time define map for a bundler
 */

import type { BuildTarget } from '../core/types.js'
import { createBuiltinEnv } from '../core/builtins.js'
import { createDefineMap } from '../core/inliner.js'
import * as reporter from '../core/reporter.js'
import { type CommandOptions, loadCommandEnv } from './context.js'

function parseTarget(target: string | undefined): BuildTarget | null {
  if (target === undefined || target === 'client') return 'client'
  if (target === 'server') return 'server'
  return null
}

/**
 * Run the define command
 */
export async function runDefine(options: CommandOptions): Promise<number> {
  const { config } = options

  const target = parseTarget(options.target)
  if (!target) {
    reporter.printError(`Unknown target: ${options.target} (expected client or server)`)
    return 1
  }

  const env = await loadCommandEnv(options)
  const builtins = createBuiltinEnv({
    base: options.base ?? config.base,
    mode: env.mode,
    ssr: target === 'server',
  })

  const define = createDefineMap({
    publicEnv: env.partition.public,
    builtins,
    prefix: config.publicPrefix,
  })
  console.log(JSON.stringify(define, null, 2))

  return 0
}
