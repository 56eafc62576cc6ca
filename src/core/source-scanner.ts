/**
 * Source file scanner for detecting environment variable usage
 *
 * Scans source files for:
 * - import.meta.env.KEY
 * - process.env.KEY
 * - process.env["KEY"] / process.env['KEY']
 *
 * Files matching the configured server patterns never reach the browser.
 * Every other file is treated as client-reachable, so a private variable
 * referenced there is reported as a leak.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { globSync } from 'glob'
import type { EnvUsage, ResolvedConfig } from './types.js'
import { isPublicVariable, isReservedName } from './classifier.js'
import { getPluginIgnoreMissing } from '../plugins/registry.js'
import { nodePlatform } from '../builtin-plugins/node/index.js'
import { vercelPlatform } from '../builtin-plugins/vercel/index.js'
import { cloudflarePagesPlatform } from '../builtin-plugins/cloudflare-pages/index.js'
import { netlifyPlatform } from '../builtin-plugins/netlify/index.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Result of scanning source files for env usage
 */
export interface SourceScanResult {
  /** Environment variables found in source files */
  usedVars: Map<string, EnvUsage[]>
  /** Total files scanned */
  filesScanned: number
  /** Total lines scanned */
  linesScanned: number
}

/**
 * Result of checking env usage against the defined variables
 */
export interface DiagnoseResult {
  /** Private vars referenced from client-reachable files (client usages only) */
  leaks: Map<string, EnvUsage[]>
  /** Public vars referenced but not defined anywhere */
  undeclaredPublic: Map<string, EnvUsage[]>
  /** Defined vars that no source file reads */
  unused: Set<string>
  /** Vars both used and defined */
  defined: Set<string>
}

// =============================================================================
// Regex Patterns
// =============================================================================

const ENV_PATTERNS = [
  /import\.meta\.env\.([A-Za-z_][A-Za-z0-9_]*)/g,
  /process\.env\.([A-Za-z_][A-Za-z0-9_]*)/g,
  /process\.env\[["']([A-Za-z_][A-Za-z0-9_]*)["']\]/g,
]

/**
 * Always ignored: NODE_ENV is replaced in every build, and the bundled
 * platforms inject their variables whether or not their plugin is enabled
 */
const BUILTIN_IGNORED = [
  'NODE_ENV',
  ...[nodePlatform, vercelPlatform, cloudflarePagesPlatform, netlifyPlatform].flatMap(
    (platform) => [platform.originVariable, ...platform.platformVariables]
  ),
]

// =============================================================================
// Scanning Helpers
// =============================================================================

/**
 * Find env references on one line
 */
export function extractEnvUsages(
  line: string,
  lineNumber: number,
  file: string,
  serverOnly: boolean
): Array<{ name: string; usage: EnvUsage }> {
  const found: Array<{ name: string; usage: EnvUsage }> = []

  for (const pattern of ENV_PATTERNS) {
    pattern.lastIndex = 0

    let match: RegExpExecArray | null
    while ((match = pattern.exec(line)) !== null) {
      found.push({
        name: match[1],
        usage: { file, line: lineNumber, pattern: match[0], serverOnly },
      })
    }
  }

  return found
}

function addUsage(usedVars: Map<string, EnvUsage[]>, name: string, usage: EnvUsage): void {
  const usages = usedVars.get(name)
  if (usages) {
    usages.push(usage)
  } else {
    usedVars.set(name, [usage])
  }
}

/**
 * Scan a single file for env variable usage
 */
function scanFile(
  filePath: string,
  relativePath: string,
  serverOnly: boolean,
  result: SourceScanResult
): void {
  const content = fs.readFileSync(filePath, 'utf-8')
  const lines = content.split('\n')

  result.linesScanned += lines.length

  for (let i = 0; i < lines.length; i++) {
    for (const { name, usage } of extractEnvUsages(lines[i], i + 1, relativePath, serverOnly)) {
      addUsage(result.usedVars, name, usage)
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Scan the project's source directory for env variable usage
 */
export function scanSources(rootDir: string, config: ResolvedConfig): SourceScanResult {
  const result: SourceScanResult = {
    usedVars: new Map(),
    filesScanned: 0,
    linesScanned: 0,
  }

  const { sourceDir, extensions, skipDirs, serverPatterns } = config.scanning
  const srcDir = path.resolve(rootDir, sourceDir)

  if (!fs.existsSync(srcDir)) {
    return result
  }

  const ignore = skipDirs.map((dir) => `**/${dir}/**`)
  const extensionSet = new Set(extensions)

  const files = globSync('**/*', { cwd: srcDir, nodir: true, posix: true, ignore })
    .filter((file) => extensionSet.has(path.extname(file)))
    .sort()

  const serverFiles = new Set(
    serverPatterns.length > 0
      ? globSync(serverPatterns, { cwd: srcDir, nodir: true, posix: true, ignore })
      : []
  )

  for (const file of files) {
    const fullPath = path.join(srcDir, file)
    const relativePath = path.relative(rootDir, fullPath).split(path.sep).join('/')
    result.filesScanned++
    scanFile(fullPath, relativePath, serverFiles.has(file), result)
  }

  return result
}

/**
 * Merge multiple scan results
 */
export function mergeScanResults(results: SourceScanResult[]): SourceScanResult {
  const merged: SourceScanResult = {
    usedVars: new Map(),
    filesScanned: 0,
    linesScanned: 0,
  }

  for (const result of results) {
    merged.filesScanned += result.filesScanned
    merged.linesScanned += result.linesScanned

    for (const [varName, usages] of result.usedVars) {
      for (const usage of usages) {
        addUsage(merged.usedVars, varName, usage)
      }
    }
  }

  return merged
}

/**
 * Names never reported: NODE_ENV, platform vars and plugin-provided names
 */
function getIgnored(): Set<string> {
  return new Set([...BUILTIN_IGNORED, ...getPluginIgnoreMissing()])
}

/**
 * Check env variable usage against the defined variables
 */
export function diagnoseEnvUsage(
  usedVars: Map<string, EnvUsage[]>,
  definedVars: Set<string>,
  config: ResolvedConfig
): DiagnoseResult {
  const prefix = config.publicPrefix
  const ignored = getIgnored()
  const ignoredUnused = new Set(config.scanning.ignoreUnused)

  const leaks = new Map<string, EnvUsage[]>()
  const undeclaredPublic = new Map<string, EnvUsage[]>()
  const unused = new Set<string>()
  const defined = new Set<string>()

  for (const [name, usages] of usedVars) {
    if (isReservedName(name) || ignored.has(name)) {
      continue
    }

    if (definedVars.has(name)) {
      defined.add(name)
    }

    if (isPublicVariable(name, prefix)) {
      if (!definedVars.has(name)) {
        undeclaredPublic.set(name, usages)
      }
      continue
    }

    const clientUsages = usages.filter((usage) => !usage.serverOnly)
    if (clientUsages.length > 0) {
      leaks.set(name, clientUsages)
    }
  }

  for (const name of definedVars) {
    if (isReservedName(name) || ignored.has(name) || ignoredUnused.has(name)) {
      continue
    }

    if (!usedVars.has(name)) {
      unused.add(name)
    }
  }

  return { leaks, undeclaredPublic, unused, defined }
}
