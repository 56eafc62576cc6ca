import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { runStatus } from '@/commands/status.js'
import { setColorsEnabled } from '@/core/reporter.js'
import { clearRegistry } from '@/plugins/registry.js'
import { captureConsole, commandOptions, createProject, removeProject } from './helpers.js'

describe('runStatus', () => {
  let rootDir: string
  let output: ReturnType<typeof captureConsole>

  beforeEach(() => {
    clearRegistry()
    setColorsEnabled(false)
    output = captureConsole()
    rootDir = createProject({
      '.env': 'PUBLIC_TITLE=Shop\nDATABASE_URL=postgres://localhost/shop\n',
      '.env.local': 'PUBLIC_API_URL=http://localhost:3000\n',
    })
  })

  afterEach(() => {
    output.restore()
    setColorsEnabled(true)
    removeProject(rootDir)
  })

  it('should list variables by visibility with their source', async () => {
    const code = await runStatus(commandOptions(rootDir))

    expect(code).toBe(0)
    const lines = output.logged()
    const publicAt = lines.indexOf('Public (2)')
    expect(lines.slice(publicAt, publicAt + 3)).toEqual([
      'Public (2)',
      '  PUBLIC_API_URL public (.env.local)',
      '  PUBLIC_TITLE public (.env)',
    ])
    const privateAt = lines.indexOf('Private (1)')
    expect(lines[privateAt + 1]).toBe('  DATABASE_URL private (.env)')
  })

  it('should show public values in verbose mode only', async () => {
    await runStatus(commandOptions(rootDir, { verbose: true }))

    expect(output.logged()).toContain('  PUBLIC_TITLE public (.env = Shop)')
    expect(output.logged()).toContain('  DATABASE_URL private (.env)')
  })

  it('should attribute values overridden by the process', async () => {
    await runStatus(
      commandOptions(rootDir, {
        processEnv: { DATABASE_URL: 'postgres://db/prod', PUBLIC_REGION: 'eu', HOME: '/root' },
      })
    )

    expect(output.logged()).toContain('  DATABASE_URL private (process)')
    expect(output.logged()).toContain('  PUBLIC_REGION public (process)')
    expect(output.logged()).not.toContain('  HOME private (process)')
  })

  it('should say when a section is empty', async () => {
    removeProject(rootDir)
    rootDir = createProject({})

    await runStatus(commandOptions(rootDir))

    expect(output.logged()).toContain('Mode development: no env files found')
    expect(output.logged().filter((line) => line === '  ✓ none')).toHaveLength(2)
  })
})
