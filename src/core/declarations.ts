/**
 * Type declarations for `import.meta.env`
 */

import type { BuiltinEnv } from './types.js'
import { RESERVED_NAMES } from './classifier.js'

const BUILTIN_TYPES: Record<keyof BuiltinEnv, string> = {
  BASE_URL: 'string',
  MODE: 'string',
  DEV: 'boolean',
  PROD: 'boolean',
  SSR: 'boolean',
}

/**
 * Generate an ambient declaration of `ImportMetaEnv`.
 * Only public names are given; private variables must not be typed as
 * available on `import.meta.env`.
 */
export function generateEnvDeclarations(publicNames: string[]): string {
  const lines = [
    '// Generated by env-boundary. Do not edit.',
    '',
    'interface ImportMetaEnv {',
  ]

  for (const name of RESERVED_NAMES) {
    lines.push(`  readonly ${name}: ${BUILTIN_TYPES[name]}`)
  }

  for (const name of [...publicNames].sort()) {
    lines.push(`  readonly ${name}: string`)
  }

  lines.push('}', '', 'interface ImportMeta {', '  readonly env: ImportMetaEnv', '}', '')

  return lines.join('\n')
}
