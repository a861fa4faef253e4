import * as v from 'valibot'

import { LLM_CONFIG } from '../config'
import { cleanLabel, conceptKey } from '../concept-map/labels'
import type { Explanation, SuggestedConcept } from './types'

const ConceptEntrySchema = v.union([
  v.string(),
  v.object({
    name: v.optional(v.string()),
    label: v.optional(v.string()),
    distance: v.optional(v.unknown()),
    breadth: v.optional(v.unknown()),
  }),
])

const ExplanationReplySchema = v.object({
  explanation: v.pipe(v.string(), v.trim(), v.nonEmpty('explanation is empty')),
  concepts: v.optional(v.array(ConceptEntrySchema), []),
})

const TopicReplySchema = v.union([
  v.object({ topics: v.array(v.string()) }),
  v.array(v.string()),
])

export class ReplyParseError extends Error {}

function stripFences(text: string): string {
  return text.replace(/```(?:json)?\s*/gi, '').replace(/```/g, '').trim()
}

export function extractJson(text: string): unknown {
  const cleaned = stripFences(text)
  const start = cleaned.search(/[[{]/)
  if (start < 0) throw new ReplyParseError('model reply contains no JSON')
  const closer = cleaned[start] === '{' ? '}' : ']'
  const end = cleaned.lastIndexOf(closer)
  if (end <= start) throw new ReplyParseError('model reply contains no JSON')
  try {
    return JSON.parse(cleaned.slice(start, end + 1))
  } catch (e) {
    throw new ReplyParseError(`model reply is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }
}

export function toMetric(value: unknown, fallback: number): number {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN
  if (!Number.isFinite(n)) return fallback
  return Math.min(1, Math.max(0, n))
}

export function dedupeLabels(labels: string[]): string[] {
  const out: string[] = []
  const seen = new Set<string>()
  for (const raw of labels) {
    const label = cleanLabel(raw)
    const key = conceptKey(label)
    if (!key || seen.has(key)) continue
    seen.add(key)
    out.push(label)
  }
  return out
}

export function parseExplanation(text: string, maxConcepts: number): Explanation {
  const result = v.safeParse(ExplanationReplySchema, extractJson(text))
  if (!result.success) {
    throw new ReplyParseError(`model reply has the wrong shape: ${result.issues[0].message}`)
  }
  const seen = new Set<string>()
  const concepts: SuggestedConcept[] = []
  for (const entry of result.output.concepts) {
    const raw = typeof entry === 'string' ? entry : entry.name ?? entry.label ?? ''
    const label = cleanLabel(raw)
    const key = conceptKey(label)
    if (!key || seen.has(key)) continue
    seen.add(key)
    concepts.push({
      label,
      distance: typeof entry === 'string' ? LLM_CONFIG.defaultDistance : toMetric(entry.distance, LLM_CONFIG.defaultDistance),
      breadth: typeof entry === 'string' ? LLM_CONFIG.defaultBreadth : toMetric(entry.breadth, LLM_CONFIG.defaultBreadth),
    })
  }
  return { explanation: result.output.explanation, suggestedConcepts: concepts.slice(0, maxConcepts) }
}

// Accepts {"topics": [...]}, a bare array, or a plain comma/newline separated list.
export function parseTopicList(text: string, maxTopics: number): string[] {
  let items: string[]
  try {
    const result = v.safeParse(TopicReplySchema, extractJson(text))
    if (!result.success) throw new ReplyParseError(result.issues[0].message)
    items = Array.isArray(result.output) ? result.output : result.output.topics
  } catch (e) {
    if (!(e instanceof ReplyParseError)) throw e
    items = stripFences(text).split(/[,\n]/)
  }
  return dedupeLabels(items).slice(0, maxTopics)
}
