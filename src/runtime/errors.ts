/**
 * Errors thrown by the server-side env accessor
 */

/**
 * A required server variable is unset or empty
 */
export class MissingEnvVariableError extends Error {
  readonly variable: string

  constructor(variable: string) {
    super(`Missing required environment variable: ${variable}`)
    this.name = 'MissingEnvVariableError'
    this.variable = variable
  }
}

/**
 * The request-scoped accessor was used outside server request handling
 */
export class ServerOnlyError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ServerOnlyError'
  }
}
