import type { Explainer, ExplainRequest, Explanation, TopicSuggestionRequest } from './types'
import { withRetry, type RetryOptions } from './retry'

export class RetryingExplainer implements Explainer {
  private inner: Explainer
  private options: RetryOptions

  constructor(inner: Explainer, options: RetryOptions) {
    this.inner = inner
    this.options = options
  }

  explain(request: ExplainRequest): Promise<Explanation> {
    return withRetry(`explain "${request.topic}"`, () => this.inner.explain(request), this.options)
  }

  suggestTopics(request: TopicSuggestionRequest): Promise<string[]> {
    return withRetry('suggest topics', () => this.inner.suggestTopics(request), this.options)
  }
}
