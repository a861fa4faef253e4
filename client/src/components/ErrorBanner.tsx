import React from 'react'
import { AlertTriangle, X } from 'lucide-react'

import { Button } from './ui/button'

export default function ErrorBanner({ message, onDismiss }: { message: string; onDismiss: () => void }) {
  return (
    <div role="alert" className="fixed right-4 top-4 z-40 flex max-w-md items-start gap-3 rounded-md border border-destructive/60 bg-secondary/90 px-4 py-3 text-sm shadow-lg">
      <AlertTriangle className="mt-0.5 h-4 w-4 shrink-0 text-destructive" />
      <div className="flex-1">{message}</div>
      <Button variant="ghost" size="icon" className="h-6 w-6" aria-label="Dismiss" onClick={onDismiss}>
        <X className="h-4 w-4" />
      </Button>
    </div>
  )
}
