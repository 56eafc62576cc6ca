/**
 * Scan command - Find private variables referenced from client code
 */

import { scanSources, diagnoseEnvUsage } from '../core/source-scanner.js'
import * as reporter from '../core/reporter.js'
import { type CommandOptions, loadCommandEnv } from './context.js'

const MAX_LOCATIONS = 3

/**
 * Run the scan command
 */
export async function runScan(options: CommandOptions): Promise<number> {
  const { verbose, rootDir, config } = options

  reporter.printHeader('scan')

  const env = await loadCommandEnv(options)

  reporter.printScanning(config.scanning.sourceDir)
  const result = scanSources(rootDir, config)
  reporter.printScanComplete(result.filesScanned, result.usedVars.size)

  const diagnosis = diagnoseEnvUsage(result.usedVars, new Set(env.values.keys()), config)

  reporter.printSection('Private variables in client code:')
  if (diagnosis.leaks.size === 0) {
    reporter.printNoIssues('None')
  } else {
    for (const [name, usages] of diagnosis.leaks) {
      const shown = verbose ? usages : usages.slice(0, 1)
      for (const usage of shown) {
        reporter.printLeak(name, usage)
      }
    }
  }

  console.log('')

  reporter.printSection('Public variables without a value:')
  if (diagnosis.undeclaredPublic.size === 0) {
    reporter.printNoIssues('All referenced public variables are defined')
  } else {
    for (const [name, usages] of diagnosis.undeclaredPublic) {
      reporter.printUndeclaredPublic(name, usages.length, usages[0])

      if (verbose) {
        for (const usage of usages.slice(0, MAX_LOCATIONS)) {
          reporter.printUsageLocation(usage)
        }
        if (usages.length > MAX_LOCATIONS) {
          console.log(`    ... and ${usages.length - MAX_LOCATIONS} more`)
        }
      }
    }
  }

  console.log('')

  reporter.printSection('Potentially unused:')
  if (diagnosis.unused.size === 0) {
    reporter.printNoIssues('All defined variables are used')
  } else {
    for (const name of diagnosis.unused) {
      reporter.printUnused(name)
    }
  }

  reporter.printScanSummary(
    diagnosis.leaks.size,
    diagnosis.undeclaredPublic.size,
    diagnosis.unused.size
  )

  if (diagnosis.leaks.size > 0) {
    reporter.printLeakNextSteps(config.publicPrefix)
    return 1
  }

  return 0
}
