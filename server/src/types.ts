export type ExplanationMode = 'short' | 'long'

export type Assessment = 'known' | 'unknown'

export type ConceptStatus = 'unexplored' | Assessment | 'current'

export type ConceptNode = {
  id: string
  label: string
  status: ConceptStatus
  parentId: string | null
  assessment: Assessment | null
  expanded: boolean
  distance: number
  breadth: number
}

export type SessionState = {
  rootTopic: string
  nodes: ConceptNode[]
  currentConceptId: string
  explanationText: string
  explanationMode: ExplanationMode
  explanationCache: Partial<Record<ExplanationMode, string>>
}

export type Point = { x: number; y: number }

export type Positions = Map<string, Point>

export type Edge = { from: string; to: string; distance: number }

export type FigureNode = {
  id: string
  label: string
  x: number
  y: number
  color: string
  size: number
  status: ConceptStatus
  clickable: boolean
}

export type FigureEdge = {
  from: string
  to: string
  x1: number
  y1: number
  x2: number
  y2: number
  color: string
}

export type Viewport = {
  xRange: [number, number]
  yRange: [number, number]
}

export type Figure = {
  nodes: FigureNode[]
  edges: FigureEdge[]
  viewport: Viewport
  background: string
}
