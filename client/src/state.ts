import { useEffect, useMemo, useReducer } from 'react'
import type { CallbackResult, ExplanationMode, Figure, LoadingKind, ResetResult, SessionState } from './types'

export const STORAGE_KEY = 'conceptlens-state'

export type ViewState = {
  session: SessionState | null
  figure: Figure
  mode: ExplanationMode
  placeholder: string | null
  suggestions: string[]
  loading: LoadingKind | null
  error: string | null
}

export type Action =
  | { type: 'start'; kind: LoadingKind }
  | { type: 'loaded'; result: CallbackResult }
  | { type: 'reset'; result: ResetResult }
  | { type: 'failed'; message: string }
  | { type: 'dismiss_error' }
  | { type: 'set_mode'; mode: ExplanationMode }
  | { type: 'suggestions'; items: string[]; session: SessionState }

export const EMPTY_FIGURE: Figure = {
  nodes: [],
  edges: [],
  viewport: { xRange: [-10, 10], yRange: [-10, 10] },
  background: '#1a1a1a',
}

export function reducer(state: ViewState, action: Action): ViewState {
  switch (action.type) {
    case 'start':
      return { ...state, loading: action.kind, error: null }
    case 'loaded':
      return {
        ...state,
        session: action.result.state,
        figure: action.result.figure,
        mode: action.result.state.explanationMode,
        placeholder: null,
        loading: null,
        error: null,
      }
    case 'reset':
      return {
        ...state,
        session: null,
        figure: action.result.figure,
        placeholder: action.result.placeholder,
        suggestions: [],
        loading: null,
        error: null,
      }
    case 'failed':
      // whatever was on screen stays; only the banner changes
      return { ...state, loading: null, error: action.message }
    case 'dismiss_error':
      return { ...state, error: null }
    case 'set_mode':
      return { ...state, mode: action.mode }
    case 'suggestions':
      // answers for a map that has since been replaced or reset are stale
      if (action.session !== state.session) return state
      return { ...state, suggestions: action.items }
    default:
      return state
  }
}

type Stored = { session: SessionState | null; figure: Figure; mode: ExplanationMode }

function isStored(value: unknown): value is Stored {
  if (typeof value !== 'object' || value === null) return false
  if (!('figure' in value) || !('session' in value) || !('mode' in value)) return false
  const { figure, session, mode } = value
  if (mode !== 'short' && mode !== 'long') return false
  if (typeof figure !== 'object' || figure === null || !('nodes' in figure) || !Array.isArray(figure.nodes)) return false
  if (session === null) return true
  return typeof session === 'object' && 'rootTopic' in session && typeof session.rootTopic === 'string' && 'nodes' in session && Array.isArray(session.nodes)
}

export function makeInitialState(): ViewState {
  const base: ViewState = {
    session: null,
    figure: EMPTY_FIGURE,
    mode: 'short',
    placeholder: null,
    suggestions: [],
    loading: null,
    error: null,
  }
  try {
    const raw = localStorage.getItem(STORAGE_KEY)
    if (!raw) return base
    const parsed: unknown = JSON.parse(raw)
    if (isStored(parsed)) return { ...base, ...parsed }
    localStorage.removeItem(STORAGE_KEY)
  } catch (e) {
    console.warn('[state] ignoring stored session:', e instanceof Error ? e.message : e)
  }
  return base
}

export function persist(state: ViewState) {
  const stored: Stored = { session: state.session, figure: state.figure, mode: state.mode }
  try {
    localStorage.setItem(STORAGE_KEY, JSON.stringify(stored))
  } catch (e) {
    console.warn('[state] could not save session:', e instanceof Error ? e.message : e)
  }
}

export function useConceptMap() {
  const initial = useMemo(() => makeInitialState(), [])
  const [state, dispatch] = useReducer(reducer, initial)

  useEffect(() => {
    persist(state)
  }, [state.session, state.figure, state.mode])

  return { state, dispatch }
}

export function currentConcept(session: SessionState | null) {
  if (!session) return undefined
  return session.nodes.find(n => n.id === session.currentConceptId)
}
