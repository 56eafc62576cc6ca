/**
 * Origin command - Resolve the deployment origin for a platform
 */

import { resolveOrigin } from '../core/origin.js'
import * as reporter from '../core/reporter.js'
import { type CommandOptions, loadCommandEnv } from './context.js'

/**
 * Run the origin command
 */
export async function runOrigin(options: CommandOptions): Promise<number> {
  const processEnv = options.processEnv ?? process.env
  const env = await loadCommandEnv(options)

  // Env files can set ORIGIN for local runs; platform vars come from the process
  const lookup: Record<string, string | undefined> = {
    ...processEnv,
    ...Object.fromEntries(env.values),
  }

  const resolution = resolveOrigin(lookup, options.platform)

  if (resolution.origin === null) {
    reporter.printError(`${resolution.variable} is not set (platform: ${resolution.platform})`)
    return 1
  }

  reporter.printOrigin(resolution.platform, resolution.variable, resolution.origin)
  return 0
}
