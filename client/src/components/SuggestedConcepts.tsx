import React from 'react'
import { Sparkles } from 'lucide-react'

import { Button } from './ui/button'
import { Card, CardContent, CardHeader, CardTitle } from './ui/card'

export default function SuggestedConcepts({ items, disabled, onPick }: { items: string[]; disabled: boolean; onPick: (topic: string) => void }) {
  if (items.length === 0) return null
  return (
    <Card>
      <CardHeader>
        <CardTitle className="flex items-center gap-2 text-sm font-semibold text-muted-foreground">
          <Sparkles className="h-4 w-4" />
          Explore next
        </CardTitle>
      </CardHeader>
      <CardContent className="flex flex-wrap gap-2">
        {items.map(t => (
          <Button key={t} variant="outline" size="sm" disabled={disabled} onClick={() => onPick(t)}>
            {t}
          </Button>
        ))}
      </CardContent>
    </Card>
  )
}
