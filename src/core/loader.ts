/**
 * Loads the .env files for a mode and merges them with the process environment
 */

import * as path from 'node:path'
import type { EnvValueSource, LoadedEnv } from './types.js'
import { parseEnvFile, expandEnvValues } from './parser.js'
import { DEFAULT_PUBLIC_PREFIX, isPublicVariable, isReservedName, partitionEnv } from './classifier.js'

const MODE_PATTERN = /^[A-Za-z0-9_-]+$/

/**
 * Throw if a mode cannot be used to select env files
 */
export function validateMode(mode: string): void {
  if (!mode) {
    throw new Error('Mode must not be empty')
  }
  if (!MODE_PATTERN.test(mode)) {
    throw new Error(`Invalid mode "${mode}": only letters, digits, "_" and "-" are allowed`)
  }
  if (mode === 'local') {
    throw new Error('"local" cannot be used as a mode because it conflicts with .env.local')
  }
}

/**
 * Env file paths for a mode, lowest priority first
 */
export function getEnvFilePaths(envDir: string, mode: string): string[] {
  validateMode(mode)

  return [
    path.join(envDir, '.env'),
    path.join(envDir, '.env.local'),
    path.join(envDir, `.env.${mode}`),
    path.join(envDir, `.env.${mode}.local`),
  ]
}

export interface LoadEnvOptions {
  /** Directory holding the env files */
  envDir: string
  mode: string
  /** Prefix marking public variables */
  prefix?: string
  /** Process environment (default: process.env) */
  processEnv?: Record<string, string | undefined>
}

/**
 * Load the environment for a mode.
 *
 * Files are merged in priority order. The process environment then overrides
 * every name a file declares, and contributes its own public variables.
 */
export function loadEnv(options: LoadEnvOptions): LoadedEnv {
  const { envDir, mode, prefix = DEFAULT_PUBLIC_PREFIX, processEnv = process.env } = options

  const raw = new Map<string, string>()
  const sources = new Map<string, EnvValueSource>()
  const files: string[] = []

  for (const filePath of getEnvFilePaths(envDir, mode)) {
    const file = parseEnvFile(filePath)
    if (!file.exists) continue

    files.push(filePath)
    for (const [name, value] of file.values) {
      raw.set(name, value)
      sources.set(name, filePath)
    }
  }

  const shadowedReserved = Array.from(raw.keys()).filter(isReservedName)

  for (const [name, value] of Object.entries(processEnv)) {
    if (value === undefined) continue

    if (raw.has(name) || isPublicVariable(name, prefix)) {
      raw.set(name, value)
      sources.set(name, 'process')
    }
  }

  // Values coming from the process are taken as-is
  const fromFiles = new Map<string, string>()
  for (const [name, value] of raw) {
    if (sources.get(name) !== 'process') {
      fromFiles.set(name, value)
    }
  }
  const expanded = expandEnvValues(fromFiles, processEnv)

  const values = new Map<string, string>()
  for (const [name, value] of raw) {
    values.set(name, expanded.get(name) ?? value)
  }

  return {
    mode,
    values,
    sources,
    files,
    partition: partitionEnv(values, prefix),
    shadowedReserved,
  }
}
