import { LlmUnavailableError, errorMessage } from '../errors'

export type RetryOptions = {
  attempts: number
  delayMs: number
  sleep?: (ms: number) => Promise<void>
}

export function sleep(ms: number) { return new Promise<void>(r => setTimeout(r, ms)) }

// Fixed pause between attempts, no backoff. The last error becomes the cause.
export async function withRetry<T>(label: string, fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, opts.attempts)
  const pause = opts.sleep ?? sleep
  let lastError: unknown
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (e) {
      lastError = e
      console.warn(`[llm] ${label} failed (attempt ${attempt}/${attempts}): ${errorMessage(e)}`)
      if (attempt < attempts && opts.delayMs > 0) await pause(opts.delayMs)
    }
  }
  console.error(`[llm] ${label} gave up after ${attempts} attempts`)
  throw new LlmUnavailableError(attempts, lastError)
}
