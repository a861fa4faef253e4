export class AppError extends Error {
  status: number

  constructor(status: number, message: string) {
    super(message)
    this.status = status
    this.name = new.target.name
  }
}

export class InvalidInputError extends AppError {
  constructor(message: string) {
    super(400, message)
  }
}

export class InvalidSessionFileError extends AppError {
  constructor(message: string) {
    super(400, message)
  }
}

export class LlmUnavailableError extends AppError {
  attempts: number

  constructor(attempts: number, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : cause ? String(cause) : 'no response'
    super(502, `The language model did not answer after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${detail}`)
    this.attempts = attempts
  }
}

// Express' own body parser errors carry a `status` too (e.g. 400 on malformed JSON).
export function errorStatus(e: unknown): number {
  if (e instanceof AppError) return e.status
  if (typeof e === 'object' && e !== null && 'status' in e && typeof e.status === 'number' && e.status >= 400 && e.status < 600) {
    return e.status
  }
  return 500
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}
