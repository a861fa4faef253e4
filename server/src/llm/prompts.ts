import type { ExplanationMode } from '../types'
import type { ExplainRequest, TopicSuggestionRequest } from './types'

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string }

const LENGTH_INSTRUCTIONS: Record<ExplanationMode, string> = {
  short: 'Keep the explanation to one concise paragraph of at most 120 words.',
  long: 'Write a thorough explanation of three to five paragraphs, about 400 words, with a worked intuition where it helps.',
}

export const EXPLAIN_SYSTEM_PROMPT = `You explain topics to a single learner whose background you are told.
Go straight to the explanation. Do not restate what the learner already knows; lean on it through analogies to fill the gaps left by what they do not know.
Reply with a JSON object only, no markdown fences, shaped like:
{"explanation": string, "concepts": [{"name": string, "distance": number, "breadth": number}]}
"distance" is the semantic distance of the concept from the one it is a prerequisite of, from 0.1 (closest) to 1 (furthest), in steps of 0.1.
"breadth" is how broad the concept is, from 0.1 (narrow) to 1 (a whole field), in steps of 0.1.`

function listOrNone(items: string[]): string {
  return items.length ? items.map(s => `"${s}"`).join(', ') : '(none yet)'
}

export function buildExplainMessages(req: ExplainRequest): ChatMessage[] {
  const lines = [
    `Topic to explain: "${req.topic}".`,
    `Concepts the learner understands: ${listOrNone(req.known)}.`,
    `Concepts the learner does not understand: ${listOrNone(req.unknown)}.`,
  ]
  if (req.focus) {
    lines.push(`The learner has just told you about "${req.focus}"; take it into account explicitly.`)
  }
  lines.push(LENGTH_INSTRUCTIONS[req.mode])
  if (req.maxConcepts > 0) {
    const subject = req.focus ?? req.topic
    lines.push(`In "concepts", give exactly ${req.maxConcepts} concepts that are necessary to understand "${subject}".`)
    if (req.exclude && req.exclude.length) {
      lines.push(`Do not suggest any of: ${listOrNone(req.exclude)}.`)
    }
  } else {
    lines.push('Return "concepts" as an empty array.')
  }
  return [
    { role: 'system', content: EXPLAIN_SYSTEM_PROMPT },
    { role: 'user', content: lines.join('\n') },
  ]
}

export function buildTopicSuggestionMessages(req: TopicSuggestionRequest): ChatMessage[] {
  return [
    {
      role: 'system',
      content: 'You recommend what a learner could study next. Reply with a JSON object only: {"topics": string[]}.',
    },
    {
      role: 'user',
      content: [
        `The learner knows: ${listOrNone(req.known)}.`,
        `The learner does not know yet: ${listOrNone(req.unknown)}.`,
        `Suggest ${req.maxTopics} short topic names (one to four words each) worth exploring next.`,
      ].join('\n'),
    },
  ]
}
