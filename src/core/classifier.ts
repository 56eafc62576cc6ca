/**
 * Public/private classification of environment variable names
 */

import type { BuiltinName, EnvVisibility, PartitionedEnv } from './types.js'

/**
 * Prefix that marks a variable as public
 */
export const DEFAULT_PUBLIC_PREFIX = 'PUBLIC_'

/**
 * Names reserved for framework constants
 */
export const RESERVED_NAMES: readonly BuiltinName[] = ['BASE_URL', 'MODE', 'DEV', 'PROD', 'SSR']

/**
 * Name fragments that suggest a value must not ship to the browser
 */
export const DEFAULT_SECRET_PATTERNS = [
  'SECRET',
  'PASSWORD',
  'PASSWD',
  'PRIVATE',
  'TOKEN',
  'CREDENTIAL',
]

function assertPrefix(prefix: string): void {
  if (prefix.length === 0) {
    // An empty prefix would make every variable public
    throw new Error('Public prefix must not be empty')
  }
}

/**
 * Classify a variable name as public or private
 */
export function classifyVariable(
  name: string,
  prefix: string = DEFAULT_PUBLIC_PREFIX
): EnvVisibility {
  assertPrefix(prefix)
  return name.startsWith(prefix) ? 'public' : 'private'
}

/**
 * Check whether a variable is inlined into client code
 */
export function isPublicVariable(name: string, prefix: string = DEFAULT_PUBLIC_PREFIX): boolean {
  return classifyVariable(name, prefix) === 'public'
}

/**
 * Check whether a name is one of the framework constants
 */
export function isReservedName(name: string): name is BuiltinName {
  return RESERVED_NAMES.some((reserved) => reserved === name)
}

/**
 * Split values into public and private halves.
 * Reserved names are dropped: the framework constants always win.
 */
export function partitionEnv(
  values: Map<string, string> | Record<string, string>,
  prefix: string = DEFAULT_PUBLIC_PREFIX
): PartitionedEnv {
  assertPrefix(prefix)

  const entries = values instanceof Map ? values.entries() : Object.entries(values)
  const result: PartitionedEnv = { public: {}, private: {} }

  for (const [name, value] of entries) {
    if (isReservedName(name)) {
      continue
    }
    result[classifyVariable(name, prefix)][name] = value
  }

  return result
}

/**
 * Compile secret pattern sources into case-insensitive regexes
 */
export function compileSecretPatterns(patterns: string[]): RegExp[] {
  return patterns.map((source) => {
    try {
      return new RegExp(source, 'i')
    } catch (error) {
      throw new Error(
        `Invalid secret pattern "${source}": ${error instanceof Error ? error.message : String(error)}`
      )
    }
  })
}

/**
 * Find public variables whose names look like they hold secrets
 */
export function findSecretLikePublicVariables(
  names: Iterable<string>,
  prefix: string = DEFAULT_PUBLIC_PREFIX,
  patterns: string[] = DEFAULT_SECRET_PATTERNS
): string[] {
  const compiled = compileSecretPatterns(patterns)
  const flagged: string[] = []

  for (const name of names) {
    if (!isPublicVariable(name, prefix)) continue

    // Only the part after the prefix is meaningful
    const rest = name.slice(prefix.length)
    if (compiled.some((pattern) => pattern.test(rest))) {
      flagged.push(name)
    }
  }

  return flagged.sort()
}
