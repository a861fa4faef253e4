import React, { useEffect, useRef } from 'react'
import { useNavigate, useParams } from 'react-router-dom'

import { useConceptMap } from './state'
import type { Assessment, CallbackResult, ExplanationMode, LoadingKind, SessionState } from './types'
import {
  createSession,
  expandConcept,
  exportSession,
  fetchInitial,
  fetchSuggestions,
  importSession,
  reloadExplanation,
  setLength,
} from './lib/api'
import AppHeader from './components/AppHeader'
import ControlPanel from './components/ControlPanel'
import ErrorBanner from './components/ErrorBanner'
import GraphCanvas from './components/GraphCanvas'
import InfoPanel from './components/InfoPanel'
import SuggestedConcepts from './components/SuggestedConcepts'
import TopicOverlay from './components/TopicOverlay'

function messageOf(e: unknown) {
  return e instanceof Error ? e.message : String(e)
}

function download(filename: string, content: string) {
  const url = URL.createObjectURL(new Blob([content], { type: 'application/json' }))
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  a.click()
  URL.revokeObjectURL(url)
}

export default function ConceptMapView() {
  const { topic } = useParams()
  const navigate = useNavigate()
  const { state, dispatch } = useConceptMap()
  const { session, mode, loading } = state
  const busy = loading !== null
  // set when we navigate ourselves so the route effect does not refetch
  const suppressNextLoad = useRef(false)

  async function refreshSuggestions(next: SessionState) {
    try {
      dispatch({ type: 'suggestions', items: await fetchSuggestions(next), session: next })
    } catch (e) {
      console.warn('[view] suggestions failed:', messageOf(e))
    }
  }

  async function run(kind: LoadingKind, task: () => Promise<CallbackResult>): Promise<CallbackResult | null> {
    dispatch({ type: 'start', kind })
    try {
      const result = await task()
      dispatch({ type: 'loaded', result })
      void refreshSuggestions(result.state)
      return result
    } catch (e) {
      dispatch({ type: 'failed', message: messageOf(e) })
      return null
    }
  }

  async function showIntro() {
    try {
      dispatch({ type: 'reset', result: await fetchInitial() })
    } catch (e) {
      dispatch({ type: 'failed', message: messageOf(e) })
    }
  }

  async function startTopic(t: string, updateUrl: boolean) {
    const result = await run('topic', () => createSession(t, mode))
    if (result && updateUrl) {
      suppressNextLoad.current = true
      navigate(`/t/${encodeURIComponent(result.state.rootTopic)}`)
    }
  }

  async function loadFile(contents: string) {
    const result = await run('upload', () => importSession(contents))
    if (result) {
      suppressNextLoad.current = true
      navigate(`/t/${encodeURIComponent(result.state.rootTopic)}`)
    }
  }

  async function save(current: SessionState) {
    try {
      const file = await exportSession(current)
      download(file.filename, file.content)
    } catch (e) {
      dispatch({ type: 'failed', message: messageOf(e) })
    }
  }

  function changeMode(next: ExplanationMode) {
    if (!session) {
      dispatch({ type: 'set_mode', mode: next })
      return
    }
    void run('length', () => setLength(session, next))
  }

  function choose(nodeId: string, choice: Assessment) {
    if (!session) return
    void run('expand', () => expandConcept(session, nodeId, choice))
  }

  function reset() {
    suppressNextLoad.current = true
    navigate('/')
    void showIntro()
  }

  useEffect(() => {
    if (suppressNextLoad.current) {
      suppressNextLoad.current = false
      return
    }
    if (topic) {
      const wanted = topic.trim().toLowerCase()
      if (!session || session.rootTopic.toLowerCase() !== wanted) void startTopic(topic, false)
    } else if (!session) {
      void showIntro()
    }
  }, [topic])

  return (
    <div className="flex h-screen flex-col bg-background text-foreground">
      <AppHeader topic={session?.rootTopic} />
      <div className="flex min-h-0 flex-1 flex-col gap-4 p-4 md:flex-row md:px-8">
        <div className="relative min-h-[320px] flex-[3] overflow-hidden rounded-xl border border-border">
          <GraphCanvas figure={state.figure} busy={busy} onChoose={choose} />
          {!session && (
            <TopicOverlay busy={busy} onSubmit={t => void startTopic(t, true)} />
          )}
        </div>
        <div className="flex min-h-0 flex-[2] flex-col gap-4">
          <ControlPanel
            mode={mode}
            hasSession={session !== null}
            busy={busy}
            onMode={changeMode}
            onReload={() => { if (session) void run('reload', () => reloadExplanation(session)) }}
            onSave={() => { if (session) void save(session) }}
            onLoad={contents => void loadFile(contents)}
            onReset={reset}
            onError={message => dispatch({ type: 'failed', message })}
          />
          <InfoPanel session={session} placeholder={state.placeholder} loading={loading} />
          <SuggestedConcepts
            items={state.suggestions}
            disabled={busy}
            onPick={t => void startTopic(t, true)}
          />
        </div>
      </div>
      {state.error && <ErrorBanner message={state.error} onDismiss={() => dispatch({ type: 'dismiss_error' })} />}
    </div>
  )
}
