import { conceptKey } from '../concept-map/labels'
import type { Explainer, ExplainRequest, Explanation, TopicSuggestionRequest } from './types'

const CONCEPT_PATTERNS = [
  (s: string) => `foundations of ${s}`,
  (s: string) => `notation for ${s}`,
  (s: string) => `history of ${s}`,
  (s: string) => `applications of ${s}`,
  (s: string) => `${s} in practice`,
  (s: string) => `limits of ${s}`,
]

/** Deterministic stand-in used with USE_MOCK=1 and in tests; never touches the network. */
export class MockExplainer implements Explainer {
  calls: ExplainRequest[] = []
  topicCalls: TopicSuggestionRequest[] = []

  async explain(request: ExplainRequest): Promise<Explanation> {
    this.calls.push(request)
    const subject = request.focus ?? request.topic
    const excluded = new Set((request.exclude ?? []).map(conceptKey))
    const suggestedConcepts = CONCEPT_PATTERNS
      .map((make, i) => ({ label: make(subject), distance: 0.2 + 0.1 * i, breadth: 0.3 + 0.1 * i }))
      .filter(c => !excluded.has(conceptKey(c.label)))
      .slice(0, request.maxConcepts)
    const known = request.known.length ? request.known.join(', ') : 'nothing yet'
    const unknown = request.unknown.length ? request.unknown.join(', ') : 'nothing yet'
    const explanation = `[${request.mode}] ${request.topic}, for someone who knows ${known} and does not know ${unknown}.`
    return { explanation, suggestedConcepts }
  }

  async suggestTopics(request: TopicSuggestionRequest): Promise<string[]> {
    this.topicCalls.push(request)
    const seeds = [...request.unknown, ...request.known]
    return seeds.slice(0, request.maxTopics).map(s => `advanced ${s}`)
  }
}
