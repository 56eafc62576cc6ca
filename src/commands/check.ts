/**
 * Check command - Validate the public/private split of the loaded environment
 */

import { findSecretLikePublicVariables } from '../core/classifier.js'
import { getPluginSecretPatterns } from '../plugins/registry.js'
import * as reporter from '../core/reporter.js'
import { type CommandOptions, loadCommandEnv, describeSource } from './context.js'

/**
 * Run the check command
 */
export async function runCheck(options: CommandOptions): Promise<number> {
  const { rootDir, config } = options
  const prefix = config.publicPrefix

  reporter.printHeader('check')

  const env = await loadCommandEnv(options)
  reporter.printLoadedFiles(
    env.mode,
    env.files.map((file) => describeSource(file, rootDir) ?? file)
  )

  for (const name of env.shadowedReserved) {
    reporter.printShadowedReserved(name)
  }

  const publicNames = Object.keys(env.partition.public)
  const privateNames = Object.keys(env.partition.private)

  const secretLike = findSecretLikePublicVariables(publicNames, prefix, [
    ...config.secretPatterns,
    ...getPluginSecretPatterns(),
  ])

  for (const name of secretLike) {
    reporter.printSecretLike(name, prefix)
  }

  reporter.printCheckSummary(
    publicNames.length,
    privateNames.length,
    secretLike.length,
    env.shadowedReserved.length
  )

  if (secretLike.length > 0) {
    reporter.printError('Public variables must not hold secrets.')
    return 1
  }

  reporter.printSuccess('Environment boundary is intact.')
  return 0
}
