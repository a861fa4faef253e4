import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { EMPTY_FIGURE, STORAGE_KEY, currentConcept, makeInitialState, persist, reducer } from '../src/state'
import type { ViewState } from '../src/state'
import type { CallbackResult, SessionState } from '../src/types'

class MemoryStorage {
  private data = new Map<string, string>()
  getItem(key: string) {
    return this.data.get(key) ?? null
  }
  setItem(key: string, value: string) {
    this.data.set(key, String(value))
  }
  removeItem(key: string) {
    this.data.delete(key)
  }
  clear() {
    this.data.clear()
  }
}

const session: SessionState = {
  rootTopic: 'quaternions',
  nodes: [
    { id: 'quaternions', label: 'quaternions', status: 'unexplored', parentId: null, assessment: null, expanded: true, distance: 0, breadth: 1 },
    { id: 'rotation', label: 'rotation', status: 'current', parentId: 'quaternions', assessment: 'known', expanded: true, distance: 0.3, breadth: 0.5 },
  ],
  currentConceptId: 'rotation',
  explanationText: 'Quaternions rotate things.',
  explanationMode: 'long',
  explanationCache: { long: 'Quaternions rotate things.' },
}

const loaded: CallbackResult = { state: session, figure: { ...EMPTY_FIGURE, background: '#000000' } }

let storage: MemoryStorage

beforeEach(() => {
  storage = new MemoryStorage()
  vi.stubGlobal('localStorage', storage)
  vi.spyOn(console, 'warn').mockImplementation(() => undefined)
})

afterEach(() => {
  vi.unstubAllGlobals()
  vi.restoreAllMocks()
})

describe('reducer', () => {
  it('tracks a request from start to result', () => {
    const initial = makeInitialState()
    const started = reducer({ ...initial, error: 'old' }, { type: 'start', kind: 'expand' })
    expect(started.loading).toBe('expand')
    expect(started.error).toBeNull()

    const done = reducer(started, { type: 'loaded', result: loaded })
    expect(done.session).toBe(session)
    expect(done.figure.background).toBe('#000000')
    expect(done.mode).toBe('long')
    expect(done.loading).toBeNull()
  })

  it('keeps the previous session when a request fails', () => {
    const withSession: ViewState = reducer(makeInitialState(), { type: 'loaded', result: loaded })
    const failed = reducer({ ...withSession, loading: 'reload' }, { type: 'failed', message: 'The language model did not answer after 5 attempts: timeout' })
    expect(failed.session).toBe(session)
    expect(failed.loading).toBeNull()
    expect(failed.error).toBe('The language model did not answer after 5 attempts: timeout')
    expect(reducer(failed, { type: 'dismiss_error' }).error).toBeNull()
  })

  it('clears the session and suggestions on reset', () => {
    const withSession = reducer(reducer(makeInitialState(), { type: 'loaded', result: loaded }), { type: 'suggestions', items: ['octonions'], session })
    const reset = reducer(withSession, { type: 'reset', result: { state: null, figure: EMPTY_FIGURE, placeholder: '## How it works' } })
    expect(reset.session).toBeNull()
    expect(reset.suggestions).toEqual([])
    expect(reset.placeholder).toBe('## How it works')
    expect(reset.mode).toBe('long')
  })

  it('keeps suggestions for the map they were asked about', () => {
    const withSession = reducer(makeInitialState(), { type: 'loaded', result: loaded })
    expect(reducer(withSession, { type: 'suggestions', items: ['octonions'], session }).suggestions).toEqual(['octonions'])
  })

  it('drops suggestions that arrive after a reset or a new map', () => {
    const withSession = reducer(makeInitialState(), { type: 'loaded', result: loaded })
    const reset = reducer(withSession, { type: 'reset', result: { state: null, figure: EMPTY_FIGURE, placeholder: '## How it works' } })
    expect(reducer(reset, { type: 'suggestions', items: ['octonions'], session })).toBe(reset)

    const other: SessionState = { ...session, rootTopic: 'octonions' }
    const replaced = reducer(withSession, { type: 'loaded', result: { ...loaded, state: other } })
    expect(reducer(replaced, { type: 'suggestions', items: ['octonions'], session }).suggestions).toEqual([])
  })

  it('remembers the chosen length before a map exists', () => {
    expect(reducer(makeInitialState(), { type: 'set_mode', mode: 'long' }).mode).toBe('long')
  })
})

describe('storage', () => {
  it('starts empty without a saved session', () => {
    const st = makeInitialState()
    expect(st.session).toBeNull()
    expect(st.mode).toBe('short')
    expect(st.figure).toBe(EMPTY_FIGURE)
  })

  it('restores what was persisted', () => {
    persist(reducer(makeInitialState(), { type: 'loaded', result: loaded }))
    const st = makeInitialState()
    expect(st.session).toEqual(session)
    expect(st.mode).toBe('long')
    expect(st.loading).toBeNull()
  })

  it('drops unreadable or foreign data', () => {
    storage.setItem(STORAGE_KEY, '{not json')
    expect(makeInitialState().session).toBeNull()

    storage.setItem(STORAGE_KEY, JSON.stringify({ nodes: {}, rootId: 'x', selectedLeafId: 'x' }))
    expect(makeInitialState().session).toBeNull()
    expect(storage.getItem(STORAGE_KEY)).toBeNull()
  })
})

describe('currentConcept', () => {
  it('finds the node the explanation is focused on', () => {
    expect(currentConcept(session)?.label).toBe('rotation')
    expect(currentConcept(null)).toBeUndefined()
  })
})
