import OpenAI from 'openai'

import { buildExplainMessages, buildTopicSuggestionMessages, type ChatMessage } from './prompts'
import { ReplyParseError, parseExplanation, parseTopicList } from './parse'
import type { Explainer, ExplainRequest, Explanation, TopicSuggestionRequest } from './types'

export class OpenAIExplainer implements Explainer {
  private client: OpenAI
  private model: string

  constructor(client: OpenAI, model: string) {
    this.client = client
    this.model = model
  }

  async explain(request: ExplainRequest): Promise<Explanation> {
    const text = await this.complete(buildExplainMessages(request))
    return parseExplanation(text, request.maxConcepts)
  }

  async suggestTopics(request: TopicSuggestionRequest): Promise<string[]> {
    const text = await this.complete(buildTopicSuggestionMessages(request))
    return parseTopicList(text, request.maxTopics)
  }

  private async complete(messages: ChatMessage[]): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages,
      response_format: { type: 'json_object' },
    })
    const content = completion.choices[0]?.message?.content ?? ''
    if (!content.trim()) throw new ReplyParseError('model returned an empty reply')
    return content
  }
}
