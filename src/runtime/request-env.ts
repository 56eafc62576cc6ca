/**
 * Request-scoped access to server-side (private) variables
 *
 * Private variables are never inlined at build time. Request handlers read
 * them through a {@link RequestEnv}, which is bound to the platform's
 * environment (process.env on Node, bindings on edge platforms).
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { MissingEnvVariableError, ServerOnlyError } from './errors.js'

/**
 * Environment accessor handed to server-side request handlers
 */
export interface RequestEnv {
  get(name: string): string | undefined
}

/**
 * Something an accessor can read from
 */
export type RequestEnvSource =
  | Record<string, string | undefined>
  | ((name: string) => string | undefined)

function isBrowser(): boolean {
  return 'window' in globalThis
}

/**
 * Create an accessor over a platform environment
 */
export function createRequestEnv(source: RequestEnvSource = process.env): RequestEnv {
  if (isBrowser()) {
    throw new ServerOnlyError('Server environment variables cannot be read in the browser')
  }

  if (typeof source === 'function') {
    const lookup = source
    return { get: (name) => lookup(name) }
  }

  const record = source
  return {
    get: (name) => (Object.hasOwn(record, name) ? record[name] : undefined),
  }
}

/**
 * Read a variable that must be set
 */
export function requireEnv(env: RequestEnv, name: string): string {
  const value = env.get(name)
  if (value === undefined || value === '') {
    throw new MissingEnvVariableError(name)
  }
  return value
}

// =============================================================================
// Request Scope
// =============================================================================

const requestScope = new AsyncLocalStorage<RequestEnv>()

/**
 * Run a request handler with `env` as the current request environment
 */
export function runWithRequestEnv<T>(env: RequestEnv, handler: () => T): T {
  return requestScope.run(env, handler)
}

/**
 * Get the environment of the request being handled
 */
export function getRequestEnv(): RequestEnv {
  const env = requestScope.getStore()
  if (!env) {
    throw new ServerOnlyError(
      'No request environment: getRequestEnv() must be called while handling a request'
    )
  }
  return env
}
