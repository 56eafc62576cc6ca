#!/usr/bin/env node
/**
 * env-boundary CLI
 */

import { loadConfig } from './core/config.js'
import { loadPlugins } from './plugins/loader.js'
import { executeOnInitHooks } from './plugins/registry.js'
import { detectProjectRoot } from './core/scanner.js'
import * as reporter from './core/reporter.js'
import type { CommandOptions } from './commands/context.js'
import { parseArgs } from './cli-args.js'

import { runCheck } from './commands/check.js'
import { runStatus } from './commands/status.js'
import { runScan } from './commands/scan.js'
import { runDefine } from './commands/define.js'
import { runOrigin } from './commands/origin.js'
import { runTypes } from './commands/types.js'
import { runExport } from './commands/export.js'

// =============================================================================
// Help
// =============================================================================

function printHelp(): void {
  console.log(`
env-boundary - Public/private environment variables for server-rendered apps

Variables starting with the public prefix (default PUBLIC_) are inlined into
client and server builds. Everything else stays on the server.

Usage:
  env-boundary [command] [options]

Commands:
  check       Validate the loaded environment (default)
  status      List public and private variables
  scan        Find private variables referenced from client code
  define      Print the build-time define map as JSON
  origin      Resolve the deployment origin (ORIGIN, VERCEL_URL, CF_PAGES_URL, URL)
  types       Write import.meta.env declarations for public variables
  export      Print variables for a deployment platform

Options:
  --mode <mode>          Mode selecting .env.<mode> files
  --base <path>          Public base path (BASE_URL)
  --platform <name>      Platform for origin (node, vercel, cloudflare-pages, netlify)
  --format <fmt>         Export format (shell, json, dotenv)
  --target <target>      Build target (client, server)
  --out <file>           Output file for types
  --verbose              Verbose output
  --no-color             Disable colors
  --help, -h             Show help
  --version, -v          Show version

Examples:
  env-boundary                          # Check the development environment
  env-boundary scan                     # Look for private variables in client code
  env-boundary define --mode production --target client
  env-boundary origin --platform vercel
  env-boundary export --format shell --target client
`)
}

function printVersion(): void {
  console.log('env-boundary v0.1.0')
}

// =============================================================================
// Main
// =============================================================================

type CommandRunner = (options: CommandOptions) => Promise<number>

const COMMANDS: Record<string, CommandRunner> = {
  check: runCheck,
  status: runStatus,
  scan: runScan,
  define: runDefine,
  origin: runOrigin,
  types: runTypes,
  export: runExport,
}

async function main(argv: string[]): Promise<number> {
  const args = parseArgs(argv)

  if (args.help) {
    printHelp()
    return 0
  }

  if (args.version) {
    printVersion()
    return 0
  }

  if (args.noColor) {
    reporter.setColorsEnabled(false)
  }

  if (args.missingValue) {
    reporter.printError(`Missing value for --${args.missingValue}`)
    return 1
  }

  const run = Object.hasOwn(COMMANDS, args.command) ? COMMANDS[args.command] : undefined
  if (!run) {
    reporter.printError(`Unknown command: ${args.command}`)
    printHelp()
    return 1
  }

  try {
    const rootDir = detectProjectRoot()
    const { config, filepath } = await loadConfig(rootDir)

    if (args.verbose && filepath) {
      reporter.printInfo(`Loaded configuration from ${filepath}`)
    }

    await loadPlugins(config)
    await executeOnInitHooks(config)

    return await run({
      mode: args.mode,
      base: args.base,
      platform: args.platform,
      format: args.format,
      target: args.target,
      out: args.out,
      verbose: args.verbose,
      rootDir,
      config,
    })
  } catch (error) {
    reporter.printError(error instanceof Error ? error.message : String(error))
    return 1
  }
}

main(process.argv.slice(2)).then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => {
    reporter.printError(error instanceof Error ? error.message : String(error))
    process.exit(1)
  }
)
