import { describe, it, expect } from 'vitest'
import { parseArgs } from '@/cli-args.js'

describe('parseArgs', () => {
  it('should default to the check command', () => {
    expect(parseArgs([])).toEqual({ command: 'check' })
  })

  it('should read the command and value flags', () => {
    expect(parseArgs(['define', '--mode', 'production', '--target=server'])).toEqual({
      command: 'define',
      mode: 'production',
      target: 'server',
    })
  })

  it('should read boolean flags', () => {
    expect(parseArgs(['scan', '--verbose', '--no-color'])).toEqual({
      command: 'scan',
      verbose: true,
      noColor: true,
    })
  })

  it('should keep only the first positional argument as the command', () => {
    expect(parseArgs(['status', 'extra']).command).toBe('status')
  })

  it('should flag a value flag given last without a value', () => {
    const args = parseArgs(['define', '--target'])

    expect(args.missingValue).toBe('target')
    expect(args.target).toBeUndefined()
  })

  it('should not take the next flag as a value', () => {
    const args = parseArgs(['export', '--format', '--verbose'])

    expect(args.missingValue).toBe('format')
    expect(args.verbose).toBe(true)
  })

  it('should accept an empty value given with =', () => {
    const args = parseArgs(['define', '--base='])

    expect(args.base).toBe('')
    expect(args.missingValue).toBeUndefined()
  })

  it('should ignore unknown flags', () => {
    expect(parseArgs(['--unknown', 'check'])).toEqual({ command: 'check' })
  })
})
