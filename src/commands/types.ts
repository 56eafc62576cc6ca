/**
 * Types command - Write `import.meta.env` declarations for public variables
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { generateEnvDeclarations } from '../core/declarations.js'
import * as reporter from '../core/reporter.js'
import { type CommandOptions, loadCommandEnv } from './context.js'

export const DEFAULT_DECLARATION_FILE = 'env-boundary.d.ts'

/**
 * Run the types command
 */
export async function runTypes(options: CommandOptions): Promise<number> {
  const { rootDir } = options

  const env = await loadCommandEnv(options)
  const content = generateEnvDeclarations(Object.keys(env.partition.public))
  const outPath = path.resolve(rootDir, options.out ?? DEFAULT_DECLARATION_FILE)

  try {
    fs.writeFileSync(outPath, content)
  } catch (error) {
    reporter.printError(
      `Failed to write ${outPath}: ${error instanceof Error ? error.message : String(error)}`
    )
    return 1
  }

  reporter.printSuccess(`Wrote ${path.relative(rootDir, outPath) || outPath}`)
  return 0
}
