/**
 * Server runtime entry point
 */

export type { RequestEnv, RequestEnvSource } from './request-env.js'
export { createRequestEnv, requireEnv, runWithRequestEnv, getRequestEnv } from './request-env.js'
export { MissingEnvVariableError, ServerOnlyError } from './errors.js'
