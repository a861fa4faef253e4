import * as v from 'valibot'

import { InvalidSessionFileError } from '../errors'
import type { SessionState } from '../types'
import { conceptKey } from './labels'
import { findInvariantViolation } from './state-manager'

export const SESSION_FILE_FORMAT = 'conceptlens.session'
export const SESSION_FILE_VERSION = 1

const ModeSchema = v.picklist(['short', 'long'])
const AssessmentSchema = v.picklist(['known', 'unknown'])
const MetricSchema = v.pipe(v.number(), v.minValue(0), v.maxValue(1))

export const ConceptNodeSchema = v.object({
  id: v.pipe(v.string(), v.nonEmpty()),
  label: v.pipe(v.string(), v.nonEmpty()),
  status: v.picklist(['unexplored', 'known', 'unknown', 'current']),
  parentId: v.nullable(v.string()),
  assessment: v.nullable(AssessmentSchema),
  expanded: v.boolean(),
  distance: MetricSchema,
  breadth: MetricSchema,
})

export const SessionStateSchema = v.object({
  rootTopic: v.pipe(v.string(), v.nonEmpty()),
  nodes: v.pipe(v.array(ConceptNodeSchema), v.minLength(1)),
  currentConceptId: v.string(),
  explanationText: v.string(),
  explanationMode: ModeSchema,
  explanationCache: v.object({
    short: v.optional(v.string()),
    long: v.optional(v.string()),
  }),
})

const SessionFileSchema = v.object({
  format: v.literal(SESSION_FILE_FORMAT),
  version: v.literal(SESSION_FILE_VERSION),
  session: SessionStateSchema,
})

function describeIssues(issues: readonly v.BaseIssue<unknown>[]): string {
  const first = issues[0]
  if (!first) return 'unrecognized content'
  const path = first.path?.map(item => String(item.key)).join('.')
  return path ? `${path}: ${first.message}` : first.message
}

/** Validates an untrusted session value (from a request body or a file). */
export function parseSessionState(value: unknown): SessionState {
  const result = v.safeParse(SessionStateSchema, value)
  if (!result.success) throw new InvalidSessionFileError(`Invalid session: ${describeIssues(result.issues)}`)
  const session: SessionState = result.output
  for (const n of session.nodes) {
    if (n.id !== conceptKey(n.label)) throw new InvalidSessionFileError(`Invalid session: node id "${n.id}" does not match its label`)
  }
  const violation = findInvariantViolation(session)
  if (violation) throw new InvalidSessionFileError(`Invalid session: ${violation}`)
  return session
}

export function exportSession(session: SessionState): string {
  const file = { format: SESSION_FILE_FORMAT, version: SESSION_FILE_VERSION, session }
  return JSON.stringify(file, null, 2) + '\n'
}

export function sessionFilename(session: SessionState): string {
  const slug = conceptKey(session.rootTopic).replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '')
  return `${slug || 'session'}.concept-map.json`
}

// Browser file inputs hand over a data URL; accept raw JSON text as well.
export function decodeUpload(contents: string): string {
  const trimmed = contents.trim()
  const m = trimmed.match(/^data:([^,]*?),(.*)$/s)
  if (!m) return trimmed
  const isBase64 = /;base64$/i.test(m[1])
  try {
    return isBase64 ? Buffer.from(m[2], 'base64').toString('utf8') : decodeURIComponent(m[2])
  } catch {
    throw new InvalidSessionFileError('Upload is not a readable data URL')
  }
}

export function importSession(contents: string): SessionState {
  const text = decodeUpload(contents)
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch {
    throw new InvalidSessionFileError('Session file is not valid JSON')
  }
  const result = v.safeParse(SessionFileSchema, data)
  if (!result.success) throw new InvalidSessionFileError(`Not a session file: ${describeIssues(result.issues)}`)
  return parseSessionState(result.output.session)
}
