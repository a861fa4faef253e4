import React from 'react'
import { BookOpen, Loader2 } from 'lucide-react'

import type { LoadingKind, SessionState } from '../types'
import { currentConcept } from '../state'
import { Card, CardContent, CardHeader, CardTitle } from './ui/card'
import Markdown from './Markdown'

const LOADING_TEXT: Record<LoadingKind, string> = {
  topic: 'Building your concept map...',
  expand: 'Rewriting the explanation...',
  length: 'Changing the length...',
  reload: 'Regenerating...',
  upload: 'Loading the saved map...',
}

function Assessed({ label, items, className }: { label: string; items: string[]; className: string }) {
  if (items.length === 0) return null
  return (
    <div className="text-xs">
      <span className="text-muted-foreground">{label}: </span>
      <span className={className}>{items.join(', ')}</span>
    </div>
  )
}

type Props = {
  session: SessionState | null
  placeholder: string | null
  loading: LoadingKind | null
}

export default function InfoPanel({ session, placeholder, loading }: Props) {
  const current = currentConcept(session)
  const known = session?.nodes.filter(n => n.assessment === 'known').map(n => n.label) ?? []
  const unknown = session?.nodes.filter(n => n.assessment === 'unknown').map(n => n.label) ?? []

  return (
    <Card className="flex min-h-0 flex-1 flex-col">
      <CardHeader>
        <CardTitle className="flex items-center gap-2 text-sm font-semibold text-muted-foreground">
          <BookOpen className="h-4 w-4" />
          {session ? session.rootTopic : 'Explanation'}
        </CardTitle>
        {current && current.parentId !== null && (
          <div className="text-xs text-muted-foreground">Focus: <span className="text-foreground">{current.label}</span></div>
        )}
      </CardHeader>
      <CardContent className="min-h-0 flex-1 space-y-3 overflow-auto">
        {loading && (
          <div className="flex items-center gap-2 text-sm text-muted-foreground">
            <Loader2 className="h-4 w-4 animate-spin" />
            {LOADING_TEXT[loading]}
          </div>
        )}
        {session ? (
          <Markdown source={session.explanationText} className="text-foreground/90" />
        ) : (
          !loading && (placeholder ? <Markdown source={placeholder} /> : <div className="text-sm text-muted-foreground">Pick a topic to get started.</div>)
        )}
        <Assessed label="Known" items={known} className="text-wheat" />
        <Assessed label="Unknown" items={unknown} className="text-coral" />
      </CardContent>
    </Card>
  )
}
