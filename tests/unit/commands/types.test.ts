import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs'
import * as path from 'node:path'
import { runTypes, DEFAULT_DECLARATION_FILE } from '@/commands/types.js'
import { setColorsEnabled } from '@/core/reporter.js'
import { clearRegistry } from '@/plugins/registry.js'
import { captureConsole, commandOptions, createProject, removeProject } from './helpers.js'

describe('runTypes', () => {
  let rootDir: string
  let output: ReturnType<typeof captureConsole>

  beforeEach(() => {
    clearRegistry()
    setColorsEnabled(false)
    output = captureConsole()
    rootDir = createProject({
      '.env': 'PUBLIC_TITLE=Shop\nDATABASE_URL=postgres://localhost/shop\n',
    })
  })

  afterEach(() => {
    output.restore()
    setColorsEnabled(true)
    removeProject(rootDir)
  })

  it('should write declarations for public variables only', async () => {
    const code = await runTypes(commandOptions(rootDir))

    expect(code).toBe(0)
    const content = fs.readFileSync(path.join(rootDir, DEFAULT_DECLARATION_FILE), 'utf-8')
    expect(content).toContain('  readonly PUBLIC_TITLE: string\n')
    expect(content).not.toContain('DATABASE_URL')
    expect(output.logged()).toEqual(['✓ Wrote env-boundary.d.ts'])
  })

  it('should write to a custom path', async () => {
    fs.mkdirSync(path.join(rootDir, 'types'))

    await runTypes(commandOptions(rootDir, { out: 'types/env.d.ts' }))

    expect(fs.existsSync(path.join(rootDir, 'types/env.d.ts'))).toBe(true)
    expect(output.logged()).toEqual([`✓ Wrote ${path.join('types', 'env.d.ts')}`])
  })

  it('should report a write failure', async () => {
    const code = await runTypes(commandOptions(rootDir, { out: 'missing/env.d.ts' }))

    expect(code).toBe(1)
    expect(output.errors()[0]).toMatch(/^✗ Failed to write .*env\.d\.ts: /)
  })
})
