import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { loadEnv, getEnvFilePaths, validateMode } from '@/core/loader.js'

describe('loader', () => {
  let envDir: string

  function writeEnv(name: string, content: string): void {
    fs.writeFileSync(path.join(envDir, name), content)
  }

  beforeEach(() => {
    envDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-boundary-loader-'))
  })

  afterEach(() => {
    fs.rmSync(envDir, { recursive: true, force: true })
  })

  describe('validateMode', () => {
    it('should accept ordinary modes', () => {
      expect(() => validateMode('development')).not.toThrow()
      expect(() => validateMode('staging-eu_1')).not.toThrow()
    })

    it('should reject an empty mode', () => {
      expect(() => validateMode('')).toThrow('Mode must not be empty')
    })

    it('should reject modes that are not safe in file names', () => {
      expect(() => validateMode('../prod')).toThrow('Invalid mode "../prod"')
    })

    it('should reject the local mode', () => {
      expect(() => validateMode('local')).toThrow('conflicts with .env.local')
    })
  })

  describe('getEnvFilePaths', () => {
    it('should list env files lowest priority first', () => {
      expect(getEnvFilePaths('/project', 'production')).toEqual([
        path.join('/project', '.env'),
        path.join('/project', '.env.local'),
        path.join('/project', '.env.production'),
        path.join('/project', '.env.production.local'),
      ])
    })
  })

  describe('loadEnv', () => {
    it('should merge files with later files taking priority', () => {
      writeEnv('.env', 'PUBLIC_TITLE=Base\nDB_HOST=db\nLOG_LEVEL=info\n')
      writeEnv('.env.local', 'LOG_LEVEL=debug\n')
      writeEnv('.env.production', 'PUBLIC_TITLE=Prod\n')
      writeEnv('.env.production.local', 'DB_HOST=prod-db\n')

      const env = loadEnv({ envDir, mode: 'production', processEnv: {} })

      expect(env.values.get('PUBLIC_TITLE')).toBe('Prod')
      expect(env.values.get('DB_HOST')).toBe('prod-db')
      expect(env.values.get('LOG_LEVEL')).toBe('debug')
      expect(env.sources.get('PUBLIC_TITLE')).toBe(path.join(envDir, '.env.production'))
      expect(env.files).toEqual([
        path.join(envDir, '.env'),
        path.join(envDir, '.env.local'),
        path.join(envDir, '.env.production'),
        path.join(envDir, '.env.production.local'),
      ])
    })

    it('should not load files for other modes', () => {
      writeEnv('.env.staging', 'PUBLIC_TITLE=Staging\n')

      const env = loadEnv({ envDir, mode: 'development', processEnv: {} })

      expect(env.values.has('PUBLIC_TITLE')).toBe(false)
      expect(env.files).toEqual([])
    })

    it('should let the process override declared names', () => {
      writeEnv('.env', 'DB_HOST=db\n')

      const env = loadEnv({ envDir, mode: 'development', processEnv: { DB_HOST: 'from-shell' } })

      expect(env.values.get('DB_HOST')).toBe('from-shell')
      expect(env.sources.get('DB_HOST')).toBe('process')
    })

    it('should take public names from the process but not undeclared private ones', () => {
      const env = loadEnv({
        envDir,
        mode: 'development',
        processEnv: { PUBLIC_BUILD_ID: 'abc123', HOME: '/home/dev', SHELL: undefined },
      })

      expect(env.values.get('PUBLIC_BUILD_ID')).toBe('abc123')
      expect(env.values.has('HOME')).toBe(false)
      expect(env.partition.public).toEqual({ PUBLIC_BUILD_ID: 'abc123' })
    })

    it('should expand references in file values', () => {
      writeEnv('.env', 'PUBLIC_ORIGIN=https://example.com\nPUBLIC_API_URL=${PUBLIC_ORIGIN}/api\n')

      const env = loadEnv({ envDir, mode: 'development', processEnv: {} })

      expect(env.values.get('PUBLIC_API_URL')).toBe('https://example.com/api')
    })

    it('should expand against process values for overridden names', () => {
      writeEnv('.env', 'HOST=localhost\nURL=http://$HOST:3000\n')

      const env = loadEnv({ envDir, mode: 'development', processEnv: { HOST: 'example.test' } })

      expect(env.values.get('URL')).toBe('http://example.test:3000')
    })

    it('should partition values and report shadowed reserved names', () => {
      writeEnv('.env', 'PUBLIC_A=1\nSECRET_B=2\nMODE=custom\n')

      const env = loadEnv({ envDir, mode: 'development', processEnv: {} })

      expect(env.partition.public).toEqual({ PUBLIC_A: '1' })
      expect(env.partition.private).toEqual({ SECRET_B: '2' })
      expect(env.shadowedReserved).toEqual(['MODE'])
    })

    it('should use a custom prefix', () => {
      writeEnv('.env', 'VITE_A=1\nPUBLIC_B=2\n')

      const env = loadEnv({ envDir, mode: 'development', prefix: 'VITE_', processEnv: {} })

      expect(env.partition.public).toEqual({ VITE_A: '1' })
      expect(env.partition.private).toEqual({ PUBLIC_B: '2' })
    })
  })
})
