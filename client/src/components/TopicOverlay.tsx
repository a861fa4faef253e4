import React, { useState } from 'react'
import { Loader2, Search } from 'lucide-react'

import { Button } from './ui/button'
import { Card, CardContent } from './ui/card'

type Props = {
  busy: boolean
  onSubmit: (topic: string) => void
}

export default function TopicOverlay({ busy, onSubmit }: Props) {
  const [topic, setTopic] = useState('')

  function submit() {
    const t = topic.trim()
    if (!t || busy) return
    onSubmit(t)
  }

  return (
    <div className="absolute inset-0 z-10 flex items-center justify-center bg-background/70 p-4 backdrop-blur-sm">
      <Card className="w-full max-w-xl">
        <CardContent className="pt-6">
          <form
            className="flex gap-2"
            onSubmit={e => { e.preventDefault(); submit() }}
          >
            <input
              autoFocus
              value={topic}
              onChange={e => setTopic(e.target.value)}
              placeholder="What do you want to understand?"
              aria-label="Topic"
              className="h-10 flex-1 rounded-md border border-border bg-secondary/50 px-3 text-base outline-none focus:ring-2 focus:ring-ring"
            />
            <Button type="submit" disabled={busy || !topic.trim()} className="h-10 gap-2">
              {busy ? <Loader2 className="h-4 w-4 animate-spin" /> : <Search className="h-4 w-4" />}
              Explain
            </Button>
          </form>
        </CardContent>
      </Card>
    </div>
  )
}
