// The server owns these shapes; the client only ever holds what it was sent.
export type {
  Assessment,
  ConceptNode,
  ConceptStatus,
  ExplanationMode,
  Figure,
  FigureEdge,
  FigureNode,
  SessionState,
  Viewport,
} from '../../server/src/types'

export type { CallbackResult, ResetResult } from '../../server/src/callbacks'

export type SessionFile = { filename: string; content: string }

export type LoadingKind = 'topic' | 'expand' | 'length' | 'reload' | 'upload'
