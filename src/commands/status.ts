/**
 * Status command - List variables by visibility
 */

import * as reporter from '../core/reporter.js'
import { type CommandOptions, loadCommandEnv, describeSource } from './context.js'

/**
 * Run the status command
 */
export async function runStatus(options: CommandOptions): Promise<number> {
  const { rootDir, verbose } = options

  reporter.printHeader('status')

  const env = await loadCommandEnv(options)
  reporter.printLoadedFiles(
    env.mode,
    env.files.map((file) => describeSource(file, rootDir) ?? file)
  )

  const publicEntries = Object.entries(env.partition.public).sort(([a], [b]) => a.localeCompare(b))
  const privateNames = Object.keys(env.partition.private).sort()

  reporter.printSection(`Public (${publicEntries.length})`)
  if (publicEntries.length === 0) {
    reporter.printNoIssues('none')
  }
  for (const [name, value] of publicEntries) {
    const source = describeSource(env.sources.get(name), rootDir)
    // Public values end up in the client bundle anyway
    reporter.printVariable(name, 'public', verbose ? `${source} = ${value}` : source)
  }

  console.log('')

  reporter.printSection(`Private (${privateNames.length})`)
  if (privateNames.length === 0) {
    reporter.printNoIssues('none')
  }
  for (const name of privateNames) {
    reporter.printVariable(name, 'private', describeSource(env.sources.get(name), rootDir))
  }

  console.log('')
  return 0
}
