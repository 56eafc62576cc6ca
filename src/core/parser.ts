/**
 * Parser for .env files
 */

import * as fs from 'node:fs'
import type { EnvFile } from './types.js'

// =============================================================================
// Regex Patterns
// =============================================================================

/**
 * Matches: [export ]VAR_NAME=value
 */
const VAR_LINE_PATTERN = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=\s*(.*)$/

/**
 * Matches an escaped dollar, ${NAME} or $NAME
 */
const EXPANSION_PATTERN = /\\\$|\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g

/**
 * Characters that force a value to be quoted when written back
 */
const NEEDS_QUOTES_PATTERN = /[\s#"'`\\]/

// =============================================================================
// Value Parsing
// =============================================================================

const DOUBLE_QUOTE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  '\\': '\\',
}

function unescapeDoubleQuoted(value: string): string {
  return value.replace(/\\(.)/g, (match, char: string) => DOUBLE_QUOTE_ESCAPES[char] ?? match)
}

/**
 * Parse the right-hand side of a KEY=value line
 */
function parseValue(raw: string): string {
  const trimmed = raw.trim()
  const quote = trimmed[0]

  if (quote === '"' || quote === "'" || quote === '`') {
    const end = findClosingQuote(trimmed, quote)
    if (end > 0) {
      const inner = trimmed.slice(1, end)
      return quote === '"' ? unescapeDoubleQuoted(inner) : inner
    }
  }

  // Unquoted: drop an inline comment
  const commentStart = trimmed.search(/\s#/)
  return (commentStart === -1 ? trimmed : trimmed.slice(0, commentStart)).trim()
}

function findClosingQuote(value: string, quote: string): number {
  for (let i = 1; i < value.length; i++) {
    if (quote === '"' && value[i] === '\\') {
      i++
      continue
    }
    if (value[i] === quote) {
      return i
    }
  }
  return -1
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse the content of an env file
 */
export function parseEnvContent(content: string): Map<string, string> {
  const values = new Map<string, string>()

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim()

    if (!trimmed || trimmed.startsWith('#')) {
      continue
    }

    const match = trimmed.match(VAR_LINE_PATTERN)
    if (!match) {
      continue
    }

    values.set(match[1], parseValue(match[2]))
  }

  return values
}

/**
 * Parse an env file, returning an empty result if it doesn't exist
 */
export function parseEnvFile(filePath: string): EnvFile {
  if (!fs.existsSync(filePath)) {
    return { filePath, exists: false, values: new Map() }
  }

  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    throw new Error(
      `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    )
  }

  return { filePath, exists: true, values: parseEnvContent(content) }
}

// =============================================================================
// Expansion
// =============================================================================

/**
 * Expand `$NAME` and `${NAME}` references.
 *
 * References resolve against the values being expanded first, then against
 * `fallback`. Unknown names expand to an empty string; `\$` stays a literal `$`.
 */
export function expandEnvValues(
  values: Map<string, string>,
  fallback: Record<string, string | undefined> = {}
): Map<string, string> {
  const expanded = new Map<string, string>()
  const inProgress = new Set<string>()

  const resolve = (name: string): string => {
    const done = expanded.get(name)
    if (done !== undefined) return done

    const raw = values.get(name)
    if (raw === undefined) return fallback[name] ?? ''

    // Cycle: the reference expands to nothing
    if (inProgress.has(name)) return ''

    inProgress.add(name)
    const result = raw.replace(
      EXPANSION_PATTERN,
      (match: string, braced: string | undefined, bare: string | undefined) => {
        if (match === '\\$') {
          return '$'
        }
        return resolve(braced ?? bare ?? '')
      }
    )
    inProgress.delete(name)

    expanded.set(name, result)
    return result
  }

  for (const name of values.keys()) {
    resolve(name)
  }

  return expanded
}

// =============================================================================
// Formatting
// =============================================================================

/**
 * Quote a value for an env file if it needs it
 */
export function quoteEnvValue(value: string): string {
  if (!NEEDS_QUOTES_PATTERN.test(value)) {
    return value
  }

  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t')

  return `"${escaped}"`
}

/**
 * Format variables as env file content
 */
export function formatEnvFile(
  variables: Array<{ name: string; value: string; comment?: string }>
): string {
  const lines: string[] = []

  for (const { name, value, comment } of variables) {
    if (comment) {
      lines.push(`# ${comment}`)
    }
    lines.push(`${name}=${quoteEnvValue(value)}`)
  }

  return lines.join('\n') + '\n'
}
