/**
 * Build-time inlining of public variables and framework constants
 */

import type { BuildTarget, BuiltinEnv } from './types.js'
import { DEFAULT_PUBLIC_PREFIX, isPublicVariable, isReservedName } from './classifier.js'

// =============================================================================
// Types
// =============================================================================

export interface InlineSources {
  /** Public variables (name -> value) */
  publicEnv: Record<string, string>
  /** Framework constants for this build */
  builtins: BuiltinEnv
  /** Prefix marking public variables (default: 'PUBLIC_') */
  prefix?: string
}

export interface InlineOptions extends InlineSources {
  target: BuildTarget
}

/**
 * A private variable referenced through `import.meta.env` in client code
 */
export interface PrivateReference {
  name: string
  /** 1-based line number */
  line: number
}

export interface InlineResult {
  code: string
  /** Names whose references were replaced, in first-seen order */
  replaced: string[]
  privateReferences: PrivateReference[]
}

// =============================================================================
// Define Map
// =============================================================================

const ENV_OBJECT = 'import.meta.env'

/**
 * Public variables and builtins merged into one object. Names without the
 * public prefix are dropped; builtins win over reserved names.
 */
function collectInlinedValues(sources: InlineSources): Record<string, string | boolean> {
  const prefix = sources.prefix ?? DEFAULT_PUBLIC_PREFIX
  const inlined: Record<string, string | boolean> = {}

  for (const [name, value] of Object.entries(sources.publicEnv)) {
    if (isPublicVariable(name, prefix) && !isReservedName(name)) {
      inlined[name] = value
    }
  }

  return { ...inlined, ...sources.builtins }
}

/**
 * Create a define map suitable for a bundler's `define` option.
 * Private variables never appear in it.
 */
export function createDefineMap(sources: InlineSources): Record<string, string> {
  const inlined = collectInlinedValues(sources)
  const define: Record<string, string> = {}

  for (const name of Object.keys(inlined).sort()) {
    define[`${ENV_OBJECT}.${name}`] = JSON.stringify(inlined[name])
  }
  define[ENV_OBJECT] = JSON.stringify(inlined)

  return define
}

// =============================================================================
// Source Inlining
// =============================================================================

const REFERENCE_PATTERN = /(?<![\w$.])import\.meta\.env\.([A-Za-z_$][\w$]*)/g

/**
 * Line lookup for increasing offsets; scans each character once
 */
function createLineCounter(code: string): (offset: number) => number {
  let line = 1
  let position = 0

  return (offset) => {
    for (; position < offset; position++) {
      if (code.charCodeAt(position) === 10) line++
    }
    return line
  }
}

/**
 * Replace `import.meta.env.NAME` references in a module's source
 */
export function inlineEnv(code: string, options: InlineOptions): InlineResult {
  const { target, prefix = DEFAULT_PUBLIC_PREFIX } = options
  const inlined = collectInlinedValues(options)
  const replaced: string[] = []
  const privateReferences: PrivateReference[] = []
  const lineAt = createLineCounter(code)

  const markReplaced = (name: string): void => {
    if (!replaced.includes(name)) replaced.push(name)
  }

  const output = code.replace(REFERENCE_PATTERN, (match, name: string, offset: number) => {
    if (Object.hasOwn(inlined, name)) {
      markReplaced(name)
      return JSON.stringify(inlined[name])
    }

    if (isPublicVariable(name, prefix) || isReservedName(name)) {
      markReplaced(name)
      return 'undefined'
    }

    if (target === 'client') {
      privateReferences.push({ name, line: lineAt(offset) })
      markReplaced(name)
      return 'undefined'
    }

    // Server code reads private values at request time
    return match
  })

  return { code: output, replaced, privateReferences }
}
