/**
 * CLI argument parsing
 */

export interface ParsedArgs {
  command: string
  mode?: string
  base?: string
  platform?: string
  format?: string
  target?: string
  out?: string
  verbose?: boolean
  noColor?: boolean
  help?: boolean
  version?: boolean
  /** First value flag given without a value */
  missingValue?: string
}

const VALUE_FLAGS = ['mode', 'base', 'platform', 'format', 'target', 'out'] as const

type ValueFlag = (typeof VALUE_FLAGS)[number]

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name)
}

/**
 * Parse command line arguments (without the node and script paths)
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: 'check',
  }
  let commandSeen = false

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      result.help = true
    } else if (arg === '--version' || arg === '-v') {
      result.version = true
    } else if (arg === '--verbose') {
      result.verbose = true
    } else if (arg === '--no-color') {
      result.noColor = true
    } else if (arg.startsWith('--')) {
      const eq = arg.indexOf('=')
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq)

      if (isValueFlag(name)) {
        const next = args[i + 1]
        if (eq !== -1) {
          result[name] = arg.slice(eq + 1)
        } else if (next !== undefined && !next.startsWith('--')) {
          result[name] = next
          i++
        } else {
          result.missingValue ??= name
        }
      }
    } else if (!arg.startsWith('-') && !commandSeen) {
      // First non-flag argument is the command
      result.command = arg
      commandSeen = true
    }

    i++
  }

  return result
}
