/**
 * Terminal output formatting for env-boundary
 */

import type { EnvUsage, EnvVisibility } from './types.js'

// =============================================================================
// ANSI Colors
// =============================================================================

const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
}

const plainSymbols = {
  check: '✓',
  warning: '⚠',
  error: '✗',
  info: 'ℹ',
  lock: '🔒',
}

const symbolColors: Record<keyof typeof plainSymbols, keyof typeof colors | null> = {
  check: 'green',
  warning: 'yellow',
  error: 'red',
  info: 'cyan',
  lock: null,
}

// =============================================================================
// Color Control
// =============================================================================

let colorsEnabled = !process.env.NO_COLOR

/**
 * Set whether colors are enabled
 */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled
}

/**
 * Get a color code (or empty string if colors disabled)
 */
function c(color: keyof typeof colors): string {
  return colorsEnabled ? colors[color] : ''
}

/**
 * Get a symbol (with or without colors)
 */
function s(symbol: keyof typeof plainSymbols): string {
  const color = symbolColors[symbol]
  if (!colorsEnabled || color === null) {
    return plainSymbols[symbol]
  }
  return `${colors[color]}${plainSymbols[symbol]}${colors.reset}`
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? 's' : ''}`
}

// =============================================================================
// Basic Output
// =============================================================================

/**
 * Print the header
 */
export function printHeader(subtitle?: string): void {
  const suffix = subtitle ? ` ${c('dim')}${subtitle}${c('reset')}` : ''
  console.log('')
  console.log(`${s('lock')} ${c('bright')}env-boundary${c('reset')}${suffix}`)
  console.log('')
}

/**
 * Print a section title
 */
export function printSection(title: string): void {
  console.log(`${c('bright')}${title}${c('reset')}`)
}

/**
 * Print a warning
 */
export function printWarning(message: string): void {
  console.log(`${s('warning')} ${message}`)
}

/**
 * Print an error
 */
export function printError(message: string): void {
  console.error(`${s('error')} ${c('red')}${message}${c('reset')}`)
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(`${s('info')} ${message}`)
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(`${s('check')} ${message}`)
}

// =============================================================================
// Loaded Environment
// =============================================================================

/**
 * Print which env files were loaded
 */
export function printLoadedFiles(mode: string, files: string[]): void {
  if (files.length === 0) {
    console.log(`Mode ${c('cyan')}${mode}${c('reset')}: no env files found`)
  } else {
    console.log(`Mode ${c('cyan')}${mode}${c('reset')}: loaded ${files.join(', ')}`)
  }
  console.log('')
}

/**
 * Print a variable with its visibility and where it came from
 */
export function printVariable(name: string, visibility: EnvVisibility, source?: string): void {
  const tag =
    visibility === 'public'
      ? `${c('green')}public${c('reset')}`
      : `${c('magenta')}private${c('reset')}`
  const sourceHint = source ? ` ${c('dim')}(${source})${c('reset')}` : ''
  console.log(`  ${name} ${tag}${sourceHint}`)
}

/**
 * Print a public variable that looks like a secret
 */
export function printSecretLike(name: string, prefix: string): void {
  console.log(
    `  ${s('error')} ${name} ${c('red')}(looks like a secret but starts with ${prefix}; it will be sent to the browser)${c('reset')}`
  )
}

/**
 * Print a reserved name that an env file tries to set
 */
export function printShadowedReserved(name: string): void {
  console.log(
    `  ${s('warning')} ${name} ${c('yellow')}(reserved; the framework value is used instead)${c('reset')}`
  )
}

/**
 * Print the check summary
 */
export function printCheckSummary(
  publicCount: number,
  privateCount: number,
  errors: number,
  warnings: number
): void {
  console.log('')
  console.log(`${c('bright')}Summary:${c('reset')}`)
  console.log(`  ${s('check')} ${plural(publicCount, 'public variable')} (inlined at build time)`)
  console.log(`  ${s('check')} ${plural(privateCount, 'private variable')} (server only)`)

  if (errors > 0) {
    console.log(`  ${s('error')} ${c('red')}${plural(errors, 'error')}${c('reset')}`)
  }

  if (warnings > 0) {
    console.log(`  ${s('warning')} ${plural(warnings, 'warning')}`)
  }

  console.log('')
}

// =============================================================================
// Scan Mode
// =============================================================================

/**
 * Print scan progress
 */
export function printScanning(target: string): void {
  console.log(`Scanning ${c('cyan')}${target}${c('reset')}...`)
}

/**
 * Print scan complete
 */
export function printScanComplete(filesScanned: number, varsFound: number): void {
  console.log(
    `  ${s('check')} Scanned ${plural(filesScanned, 'file')}, found ${plural(varsFound, 'env variable')}`
  )
  console.log('')
}

/**
 * Print a private variable referenced from client code
 */
export function printLeak(name: string, usage: EnvUsage): void {
  console.log(
    `  ${s('error')} ${c('red')}${name}${c('reset')} ${c('dim')}(${usage.file}:${usage.line} → ${usage.pattern})${c('reset')}`
  )
}

/**
 * Print a public variable that is referenced but never defined
 */
export function printUndeclaredPublic(name: string, usageCount: number, firstUsage: EnvUsage): void {
  console.log(
    `  ${s('warning')} ${c('yellow')}${name}${c('reset')} ${c('dim')}(${plural(usageCount, 'usage')}, first: ${firstUsage.file}:${firstUsage.line})${c('reset')}`
  )
}

/**
 * Print a defined variable that no source file reads
 */
export function printUnused(name: string): void {
  console.log(`  ${c('dim')}-${c('reset')} ${name} ${c('dim')}(not found in source)${c('reset')}`)
}

/**
 * Print a usage location
 */
export function printUsageLocation(usage: EnvUsage): void {
  console.log(`    ${c('dim')}${usage.file}:${usage.line} → ${usage.pattern}${c('reset')}`)
}

/**
 * Print that a scan section has no findings
 */
export function printNoIssues(message: string): void {
  console.log(`  ${s('check')} ${message}`)
}

/**
 * Print scan summary
 */
export function printScanSummary(leaks: number, undeclared: number, unused: number): void {
  console.log('')
  console.log(`${c('bright')}Summary:${c('reset')}`)

  if (leaks > 0) {
    console.log(
      `  ${s('error')} ${c('red')}${plural(leaks, 'private variable')}${c('reset')} referenced from client code`
    )
  } else {
    console.log(`  ${s('check')} No private variables reach client code`)
  }

  if (undeclared > 0) {
    console.log(`  ${s('warning')} ${plural(undeclared, 'public variable')} used but not defined`)
  }

  if (unused > 0) {
    console.log(`  ${s('info')} ${plural(unused, 'variable')} defined but not used in code`)
  }

  console.log('')
}

/**
 * Print guidance after leaks were found
 */
export function printLeakNextSteps(prefix: string): void {
  console.log(`${c('dim')}Private variables are only available on the server.${c('reset')}`)
  console.log(
    `${c('dim')}Read them through the request environment, or rename them with ${prefix} if they are safe to publish.${c('reset')}`
  )
  console.log('')
}

// =============================================================================
// Origin
// =============================================================================

/**
 * Print a resolved origin
 */
export function printOrigin(platform: string, variable: string, origin: string): void {
  console.log(`${s('check')} ${origin} ${c('dim')}(${platform}, from ${variable})${c('reset')}`)
}
