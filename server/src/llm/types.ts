import type { ExplanationMode } from '../types'

export type SuggestedConcept = {
  label: string
  distance: number
  breadth: number
}

export type ExplainRequest = {
  topic: string
  known: string[]
  unknown: string[]
  mode: ExplanationMode
  /** Concept the user just assessed; suggestions are prerequisites of it. */
  focus?: string
  /** Labels that must not come back as suggestions. */
  exclude?: string[]
  maxConcepts: number
}

export type Explanation = {
  explanation: string
  suggestedConcepts: SuggestedConcept[]
}

export type TopicSuggestionRequest = {
  known: string[]
  unknown: string[]
  maxTopics: number
}

/**
 * Produces an explanation plus related concepts for a topic, given what the
 * learner already knows. Implementations may hit the network and may throw.
 */
export interface Explainer {
  explain(request: ExplainRequest): Promise<Explanation>
  suggestTopics(request: TopicSuggestionRequest): Promise<string[]>
}
