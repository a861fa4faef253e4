import type { Explainer, ExplainRequest, Explanation, TopicSuggestionRequest } from '../src/llm/types'
import type { ConceptNode } from '../src/types'

type Scripted<T> = T | Error

/** Explainer that replays scripted replies in order and records every request. */
export class StubExplainer implements Explainer {
  requests: ExplainRequest[] = []
  topicRequests: TopicSuggestionRequest[] = []
  private replies: Scripted<Explanation>[]
  private topicReplies: Scripted<string[]>[]

  constructor(replies: Scripted<Explanation>[] = [], topicReplies: Scripted<string[]>[] = []) {
    this.replies = [...replies]
    this.topicReplies = [...topicReplies]
  }

  async explain(request: ExplainRequest): Promise<Explanation> {
    this.requests.push(request)
    const next = this.replies.shift()
    if (next === undefined) throw new Error('no scripted reply left')
    if (next instanceof Error) throw next
    return next
  }

  async suggestTopics(request: TopicSuggestionRequest): Promise<string[]> {
    this.topicRequests.push(request)
    const next = this.topicReplies.shift()
    if (next === undefined) throw new Error('no scripted topics left')
    if (next instanceof Error) throw next
    return next
  }
}

export function reply(explanation: string, labels: string[] = []): Explanation {
  return {
    explanation,
    suggestedConcepts: labels.map((label, i) => ({ label, distance: 0.3 + 0.1 * i, breadth: 0.5 })),
  }
}

export function node(id: string, parentId: string | null, extra: Partial<ConceptNode> = {}): ConceptNode {
  return {
    id,
    label: id,
    status: parentId === null ? 'current' : 'unexplored',
    parentId,
    assessment: null,
    expanded: parentId === null,
    distance: parentId === null ? 0 : 1,
    breadth: 0.5,
    ...extra,
  }
}
