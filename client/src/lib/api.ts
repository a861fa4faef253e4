import type { Assessment, CallbackResult, ExplanationMode, ResetResult, SessionFile, SessionState } from '../types'

export class ApiError extends Error {
  status: number

  constructor(status: number, message: string) {
    super(message)
    this.status = status
    this.name = 'ApiError'
  }
}

function errorText(status: number, body: string): string {
  const fallback = body.trim() || `API ${status}`
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return fallback
  }
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
    return parsed.error
  }
  return fallback
}

async function call<T>(path: string, body?: unknown): Promise<T> {
  const init: RequestInit = body === undefined
    ? {}
    : { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) }
  const res = await fetch(path, init)
  if (!res.ok) {
    const text = await res.text().catch(() => '')
    throw new ApiError(res.status, errorText(res.status, text))
  }
  return res.json()
}

export function fetchInitial(): Promise<ResetResult> {
  return call('/api/session/initial')
}

export function createSession(topic: string, mode: ExplanationMode): Promise<CallbackResult> {
  return call('/api/session', { topic, mode })
}

export function expandConcept(state: SessionState, nodeId: string, choice: Assessment): Promise<CallbackResult> {
  return call('/api/session/expand', { state, nodeId, choice })
}

export function setLength(state: SessionState, mode: ExplanationMode): Promise<CallbackResult> {
  return call('/api/session/length', { state, mode })
}

export function reloadExplanation(state: SessionState): Promise<CallbackResult> {
  return call('/api/session/reload', { state })
}

export async function fetchSuggestions(state: SessionState | null): Promise<string[]> {
  const res = await call<{ suggestions: string[] }>('/api/session/suggestions', { state })
  return res.suggestions
}

export function exportSession(state: SessionState): Promise<SessionFile> {
  return call('/api/session/export', { state })
}

export function importSession(contents: string): Promise<CallbackResult> {
  return call('/api/session/import', { contents })
}
