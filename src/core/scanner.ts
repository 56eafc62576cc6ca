/**
 * Project root and env directory discovery
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import type { ResolvedConfig } from './types.js'

/**
 * Detect the project root: the nearest ancestor (or self) containing a
 * package.json. Falls back to the start directory.
 */
export function detectProjectRoot(startDir?: string): string {
  const originalCwd = startDir || process.cwd()
  let dir = originalCwd
  const { root } = path.parse(dir)

  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) {
      return dir
    }

    if (dir === root) {
      break
    }
    dir = path.dirname(dir)
  }

  return originalCwd
}

/**
 * Absolute directory holding the env files
 */
export function resolveEnvDir(config: ResolvedConfig, rootDir: string): string {
  return path.resolve(rootDir, config.envDir)
}

/**
 * Absolute source directory to scan
 */
export function resolveSourceDir(config: ResolvedConfig, rootDir: string): string {
  return path.resolve(rootDir, config.scanning.sourceDir)
}
