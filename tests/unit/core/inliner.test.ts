import { describe, it, expect } from 'vitest'
import { createDefineMap, inlineEnv } from '@/core/inliner.js'
import { createBuiltinEnv } from '@/core/builtins.js'

const publicEnv = {
  PUBLIC_API_URL: 'https://api.example.com',
  PUBLIC_TITLE: 'My "App"',
}

describe('inliner', () => {
  describe('createDefineMap', () => {
    it('should map each public variable and builtin to a JSON literal', () => {
      const builtins = createBuiltinEnv({ mode: 'production', ssr: false })

      const define = createDefineMap({ publicEnv, builtins })

      expect(define['import.meta.env.PUBLIC_API_URL']).toBe('"https://api.example.com"')
      expect(define['import.meta.env.PUBLIC_TITLE']).toBe('"My \\"App\\""')
      expect(define['import.meta.env.BASE_URL']).toBe('"/"')
      expect(define['import.meta.env.MODE']).toBe('"production"')
      expect(define['import.meta.env.PROD']).toBe('true')
      expect(define['import.meta.env.DEV']).toBe('false')
      expect(define['import.meta.env.SSR']).toBe('false')
    })

    it('should include the whole env object', () => {
      const builtins = createBuiltinEnv({ mode: 'development', ssr: true })

      const define = createDefineMap({ publicEnv: { PUBLIC_A: '1' }, builtins })

      expect(JSON.parse(define['import.meta.env'])).toEqual({
        PUBLIC_A: '1',
        BASE_URL: '/',
        MODE: 'development',
        DEV: true,
        PROD: false,
        SSR: true,
      })
    })

    it('should have exactly one key per inlined name plus the object', () => {
      const builtins = createBuiltinEnv({ mode: 'development', ssr: false })

      const define = createDefineMap({ publicEnv, builtins })

      expect(Object.keys(define)).toHaveLength(2 + 5 + 1)
    })

    it('should never emit a private variable', () => {
      const builtins = createBuiltinEnv({ mode: 'production', ssr: false })

      const define = createDefineMap({
        publicEnv: { PUBLIC_A: '1', DATABASE_URL: 'postgres://test-secret@localhost/db' },
        builtins,
      })

      expect(Object.keys(define)).not.toContain('import.meta.env.DATABASE_URL')
      expect(JSON.parse(define['import.meta.env'])).not.toHaveProperty('DATABASE_URL')
      expect(define['import.meta.env.PUBLIC_A']).toBe('"1"')
    })

    it('should let builtins win over reserved names', () => {
      const builtins = createBuiltinEnv({ mode: 'production', ssr: false })

      const define = createDefineMap({ publicEnv: { MODE: 'custom' }, builtins })

      expect(define['import.meta.env.MODE']).toBe('"production"')
    })

    it('should filter by a custom prefix', () => {
      const builtins = createBuiltinEnv({ mode: 'production', ssr: false })

      const define = createDefineMap({
        publicEnv: { VITE_TITLE: 'Shop', PUBLIC_TITLE: 'Other' },
        builtins,
        prefix: 'VITE_',
      })

      expect(define['import.meta.env.VITE_TITLE']).toBe('"Shop"')
      expect(define).not.toHaveProperty(['import.meta.env.PUBLIC_TITLE'])
    })
  })

  describe('inlineEnv', () => {
    const clientBuiltins = createBuiltinEnv({ mode: 'production', ssr: false })
    const serverBuiltins = createBuiltinEnv({ mode: 'production', ssr: true })

    it('should replace public variables and builtins with literals', () => {
      const code = 'fetch(import.meta.env.PUBLIC_API_URL + "/items", { cache: import.meta.env.PROD })'

      const result = inlineEnv(code, { publicEnv, builtins: clientBuiltins, target: 'client' })

      expect(result.code).toBe('fetch("https://api.example.com" + "/items", { cache: true })')
      expect(result.replaced).toEqual(['PUBLIC_API_URL', 'PROD'])
      expect(result.privateReferences).toEqual([])
    })

    it('should set SSR per target', () => {
      const code = 'if (import.meta.env.SSR) {}'

      expect(inlineEnv(code, { publicEnv, builtins: clientBuiltins, target: 'client' }).code).toBe(
        'if (false) {}'
      )
      expect(inlineEnv(code, { publicEnv, builtins: serverBuiltins, target: 'server' }).code).toBe(
        'if (true) {}'
      )
    })

    it('should replace undefined public variables with undefined', () => {
      const result = inlineEnv('const x = import.meta.env.PUBLIC_MISSING', {
        publicEnv,
        builtins: clientBuiltins,
        target: 'server',
      })

      expect(result.code).toBe('const x = undefined')
      expect(result.replaced).toEqual(['PUBLIC_MISSING'])
    })

    it('should strip private variables from client code and report them', () => {
      const code = 'const a = 1\nconst key = import.meta.env.STRIPE_SECRET_KEY'

      const result = inlineEnv(code, { publicEnv, builtins: clientBuiltins, target: 'client' })

      expect(result.code).toBe('const a = 1\nconst key = undefined')
      expect(result.privateReferences).toEqual([{ name: 'STRIPE_SECRET_KEY', line: 2 }])
    })

    it('should not inline a private variable handed over as public', () => {
      const result = inlineEnv('const db = import.meta.env.DATABASE_URL', {
        publicEnv: { DATABASE_URL: 'postgres://test-secret@localhost/db' },
        builtins: clientBuiltins,
        target: 'client',
      })

      expect(result.code).toBe('const db = undefined')
      expect(result.privateReferences).toEqual([{ name: 'DATABASE_URL', line: 1 }])
    })

    it('should number every private reference by its line', () => {
      const code = [
        'import.meta.env.A_SECRET',
        '',
        'const b = import.meta.env.B_SECRET; const c = import.meta.env.C_SECRET',
        'import.meta.env.PUBLIC_API_URL',
        'import.meta.env.D_SECRET',
      ].join('\n')

      const result = inlineEnv(code, { publicEnv, builtins: clientBuiltins, target: 'client' })

      expect(result.privateReferences).toEqual([
        { name: 'A_SECRET', line: 1 },
        { name: 'B_SECRET', line: 3 },
        { name: 'C_SECRET', line: 3 },
        { name: 'D_SECRET', line: 5 },
      ])
    })

    it('should leave private variables in server code untouched', () => {
      const code = 'const key = import.meta.env.STRIPE_SECRET_KEY'

      const result = inlineEnv(code, { publicEnv, builtins: serverBuiltins, target: 'server' })

      expect(result.code).toBe(code)
      expect(result.replaced).toEqual([])
      expect(result.privateReferences).toEqual([])
    })

    it('should not touch member accesses that only end in import.meta.env', () => {
      const code = 'obj.import.meta.env.PUBLIC_API_URL'

      const result = inlineEnv(code, { publicEnv, builtins: clientBuiltins, target: 'client' })

      expect(result.code).toBe(code)
    })

    it('should honor a custom prefix', () => {
      const result = inlineEnv('import.meta.env.VITE_X', {
        publicEnv: {},
        builtins: clientBuiltins,
        target: 'client',
        prefix: 'VITE_',
      })

      expect(result.code).toBe('undefined')
      expect(result.privateReferences).toEqual([])
    })
  })
})
