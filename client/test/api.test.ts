import { afterEach, describe, expect, it, vi } from 'vitest'
import { ApiError, createSession, fetchSuggestions, importSession } from '../src/lib/api'

function respond(status: number, body: string) {
  const fetchMock = vi.fn(async () => new Response(body, { status, headers: { 'Content-Type': 'application/json' } }))
  vi.stubGlobal('fetch', fetchMock)
  return fetchMock
}

afterEach(() => {
  vi.unstubAllGlobals()
})

describe('api', () => {
  it('posts the topic and the chosen length', async () => {
    const fetchMock = respond(200, JSON.stringify({ state: null, figure: null }))
    await createSession('quaternions', 'long')
    expect(fetchMock).toHaveBeenCalledWith('/api/session', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"topic":"quaternions","mode":"long"}',
    })
  })

  it('unwraps the suggestion list', async () => {
    respond(200, '{"suggestions":["octonions"]}')
    expect(await fetchSuggestions(null)).toEqual(['octonions'])
  })

  it('surfaces the server error message with its status', async () => {
    respond(400, '{"error":"Session file is not valid JSON"}')
    const failure = importSession('hello')
    await expect(failure).rejects.toBeInstanceOf(ApiError)
    await expect(failure).rejects.toMatchObject({ status: 400, message: 'Session file is not valid JSON' })
  })

  it('falls back to the raw body when it is not JSON', async () => {
    respond(502, 'Bad Gateway')
    await expect(createSession('x', 'short')).rejects.toThrow('Bad Gateway')
  })
})
