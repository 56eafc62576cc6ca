import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { vi } from 'vitest'
import { mergeWithDefaults } from '@/core/config.js'
import type { EnvBoundaryConfig } from '@/core/types.js'
import type { CommandOptions } from '@/commands/context.js'

/**
 * Create a temporary project with the given files
 */
export function createProject(files: Record<string, string>): string {
  const rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-boundary-cmd-'))
  for (const [relativePath, content] of Object.entries(files)) {
    const fullPath = path.join(rootDir, relativePath)
    fs.mkdirSync(path.dirname(fullPath), { recursive: true })
    fs.writeFileSync(fullPath, content)
  }
  return rootDir
}

export function removeProject(rootDir: string): void {
  fs.rmSync(rootDir, { recursive: true, force: true })
}

/**
 * Command options isolated from the real process environment
 */
export function commandOptions(
  rootDir: string,
  overrides: Partial<Omit<CommandOptions, 'config'>> = {},
  config: EnvBoundaryConfig = {}
): CommandOptions {
  return {
    rootDir,
    config: mergeWithDefaults(config),
    processEnv: {},
    ...overrides,
  }
}

/**
 * Capture console output as plain lines
 */
export function captureConsole() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {})
  const error = vi.spyOn(console, 'error').mockImplementation(() => {})

  return {
    logged: (): string[] => log.mock.calls.map((c) => String(c[0])),
    errors: (): string[] => error.mock.calls.map((c) => String(c[0])),
    restore: (): void => {
      log.mockRestore()
      error.mockRestore()
    },
  }
}
