import React from 'react'
import { Network } from 'lucide-react'

export default function AppHeader({ topic }: { topic?: string }) {
  return (
    <header className="flex items-center justify-between border-b border-border px-4 py-3 md:px-8">
      <div className="flex items-center gap-2">
        <Network className="h-5 w-5 text-accent" />
        <h1 className="text-lg font-semibold tracking-tight">conceptlens</h1>
        <span className="hidden text-sm text-muted-foreground md:inline">explain like I'm an expert</span>
      </div>
      {topic && <div className="truncate text-sm text-muted-foreground">Exploring <span className="text-foreground">{topic}</span></div>}
    </header>
  )
}
