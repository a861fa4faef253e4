import OpenAI from 'openai'

import type { ServerConfig } from '../config'
import { MockExplainer } from './mock-explainer'
import { OpenAIExplainer } from './openai-explainer'
import { RetryingExplainer } from './retrying-explainer'
import type { Explainer } from './types'

export type { Explainer, ExplainRequest, Explanation, SuggestedConcept, TopicSuggestionRequest } from './types'
export { MockExplainer } from './mock-explainer'
export { RetryingExplainer } from './retrying-explainer'

export function createExplainer(config: ServerConfig): Explainer {
  let base: Explainer
  if (config.useMock) {
    console.log('[llm] USE_MOCK=1, using the mock explainer')
    base = new MockExplainer()
  } else if (!config.apiKey) {
    console.warn('[llm] OPENAI_API_KEY not set, falling back to the mock explainer. Set USE_MOCK=1 to silence this.')
    base = new MockExplainer()
  } else {
    // retries happen in RetryingExplainer only
    base = new OpenAIExplainer(new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 }), config.model)
  }
  return new RetryingExplainer(base, { attempts: config.maxRetries, delayMs: config.retryDelayMs })
}
