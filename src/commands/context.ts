/**
 * Shared command plumbing
 */

import * as path from 'node:path'
import type { LoadedEnv, ResolvedConfig } from '../core/types.js'
import { loadEnv } from '../core/loader.js'
import { resolveEnvDir } from '../core/scanner.js'
import { executeAfterLoadHooks } from '../plugins/registry.js'

/**
 * Options every command receives from the CLI
 */
export interface CommandOptions {
  mode?: string
  base?: string
  platform?: string
  format?: string
  target?: string
  out?: string
  verbose?: boolean
  rootDir: string
  config: ResolvedConfig
  /** Process environment (default: process.env) */
  processEnv?: Record<string, string | undefined>
}

/**
 * Load the environment for the command's mode and run afterLoad hooks
 */
export async function loadCommandEnv(options: CommandOptions): Promise<LoadedEnv> {
  const { config, rootDir } = options

  const env = loadEnv({
    envDir: resolveEnvDir(config, rootDir),
    mode: options.mode ?? config.mode,
    prefix: config.publicPrefix,
    processEnv: options.processEnv ?? process.env,
  })

  await executeAfterLoadHooks(env)

  return env
}

/**
 * Display form of a value source: a path relative to the root, or 'process'
 */
export function describeSource(source: string | undefined, rootDir: string): string | undefined {
  if (source === undefined || source === 'process') {
    return source
  }
  return path.relative(rootDir, source) || source
}
