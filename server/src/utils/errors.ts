export class HttpError extends Error {
  readonly status: number

  constructor(message: string, status: number) {
    super(message)
    this.name = 'HttpError'
    this.status = status
  }
}

export const badRequest = (message: string): HttpError => new HttpError(message, 400)

/**
 * Raised when a source table cannot be read or joined. The server refuses to
 * start on this error; there is no partial dataset.
 */
export class RegistryLoadError extends Error {
  readonly source: string

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source}: ${message}`, options)
    this.name = 'RegistryLoadError'
    this.source = source
  }
}

export const errorStatus = (error: unknown): number =>
  error instanceof HttpError ? error.status : 500

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
