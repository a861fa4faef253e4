import React, { useRef } from 'react'
import { Download, RefreshCw, RotateCcw, Upload } from 'lucide-react'

import type { ExplanationMode } from '../types'
import { cn } from '../lib/utils'
import { Button } from './ui/button'

type Props = {
  mode: ExplanationMode
  hasSession: boolean
  busy: boolean
  onMode: (mode: ExplanationMode) => void
  onReload: () => void
  onSave: () => void
  onLoad: (contents: string) => void
  onReset: () => void
  onError: (message: string) => void
}

const MODES: { value: ExplanationMode; label: string }[] = [
  { value: 'short', label: 'Short' },
  { value: 'long', label: 'Long' },
]

export default function ControlPanel({ mode, hasSession, busy, onMode, onReload, onSave, onLoad, onReset, onError }: Props) {
  const fileRef = useRef<HTMLInputElement | null>(null)

  function readFile(file: File) {
    const reader = new FileReader()
    reader.onload = () => {
      if (typeof reader.result === 'string') onLoad(reader.result)
      else onError('Could not read the selected file')
    }
    reader.onerror = () => onError(`Could not read ${file.name}`)
    reader.readAsDataURL(file)
  }

  return (
    <div className="flex flex-wrap items-center gap-2">
      <div role="radiogroup" aria-label="Explanation length" className="flex rounded-md border border-border p-0.5">
        {MODES.map(m => (
          <button
            key={m.value}
            type="button"
            role="radio"
            aria-checked={mode === m.value}
            disabled={busy}
            onClick={() => { if (m.value !== mode) onMode(m.value) }}
            className={cn(
              'rounded px-3 py-1 text-xs font-medium transition-colors disabled:opacity-50',
              mode === m.value ? 'bg-accent text-background' : 'text-muted-foreground hover:text-foreground'
            )}
          >
            {m.label}
          </button>
        ))}
      </div>
      <Button variant="ghost" size="icon" aria-label="Regenerate explanation" disabled={busy || !hasSession} onClick={onReload}>
        <RefreshCw className={cn('h-4 w-4', busy && 'animate-spin')} />
      </Button>
      <Button variant="ghost" size="icon" aria-label="Save concept map" disabled={busy || !hasSession} onClick={onSave}>
        <Download className="h-4 w-4" />
      </Button>
      <Button variant="ghost" size="icon" aria-label="Load concept map" disabled={busy} onClick={() => fileRef.current?.click()}>
        <Upload className="h-4 w-4" />
      </Button>
      <input
        ref={fileRef}
        type="file"
        accept=".json,application/json"
        className="hidden"
        onChange={e => {
          const file = e.target.files?.[0]
          if (file) readFile(file)
          e.target.value = ''
        }}
      />
      <Button variant="secondary" size="sm" className="gap-2" disabled={busy} onClick={onReset}>
        <RotateCcw className="h-4 w-4" />
        New topic
      </Button>
    </div>
  )
}
