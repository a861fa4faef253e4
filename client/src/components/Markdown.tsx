import React from 'react'
import ReactMarkdown from 'react-markdown'

import { cn } from '../lib/utils'

export default function Markdown({ source, className }: { source: string; className?: string }) {
  return (
    <div
      className={cn(
        'space-y-3 text-sm leading-6 text-muted-foreground',
        '[&_h2]:text-base [&_h2]:font-semibold [&_h2]:text-foreground [&_strong]:text-foreground',
        '[&_ol]:list-decimal [&_ul]:list-disc [&_ol]:space-y-2 [&_ul]:space-y-1 [&_ol]:pl-5 [&_ul]:pl-5',
        '[&_code]:font-mono [&_code]:text-accent [&_a]:underline',
        className,
      )}
    >
      <ReactMarkdown>{source}</ReactMarkdown>
    </div>
  )
}
