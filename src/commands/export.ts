/**
 * Export command - Print variables for a deployment platform
 *
 * Formats:
 * - shell: export KEY='value'
 * - json: { "KEY": "value" }
 * - dotenv: KEY=value, quoted where needed
 *
 * `--target client` restricts the output to public variables.
 */

import type { ExportFormat, BuildTarget } from '../core/types.js'
import { formatEnvFile } from '../core/parser.js'
import * as reporter from '../core/reporter.js'
import { type CommandOptions, loadCommandEnv } from './context.js'

const EXPORT_FORMATS: readonly ExportFormat[] = ['shell', 'json', 'dotenv']

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value)
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`
}

/**
 * Format variables in the requested format
 */
export function formatExport(variables: Record<string, string>, format: ExportFormat): string {
  const names = Object.keys(variables).sort()

  switch (format) {
    case 'json': {
      const sorted: Record<string, string> = {}
      for (const name of names) {
        sorted[name] = variables[name]
      }
      return JSON.stringify(sorted, null, 2)
    }

    case 'dotenv':
      return formatEnvFile(names.map((name) => ({ name, value: variables[name] }))).trimEnd()

    case 'shell':
      return names.map((name) => `export ${name}=${shellQuote(variables[name])}`).join('\n')
  }
}

/**
 * Run the export command
 */
export async function runExport(options: CommandOptions): Promise<number> {
  const format = options.format ?? 'dotenv'
  const target = options.target ?? 'server'

  if (!isExportFormat(format)) {
    reporter.printError(`Unknown format: ${format} (expected ${EXPORT_FORMATS.join(', ')})`)
    return 1
  }

  if (target !== 'client' && target !== 'server') {
    reporter.printError(`Unknown target: ${target} (expected client or server)`)
    return 1
  }

  const buildTarget: BuildTarget = target
  const env = await loadCommandEnv(options)

  const variables =
    buildTarget === 'client'
      ? env.partition.public
      : { ...env.partition.public, ...env.partition.private }

  if (Object.keys(variables).length === 0) {
    reporter.printWarning('No variables to export.')
    return 0
  }

  console.log(formatExport(variables, format))
  return 0
}
