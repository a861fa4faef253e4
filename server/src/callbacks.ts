import * as v from 'valibot'

import { autoscaleFigure, generateFigure } from './concept-map/graph-manager'
import { exportSession, importSession, parseSessionState, sessionFilename } from './concept-map/session-file'
import {
  createNewConceptMap,
  expandConceptMap,
  initialSession,
  reloadExplanation,
  suggestTopics,
  updateExplanationLength,
} from './concept-map/state-manager'
import { InvalidInputError } from './errors'
import type { Explainer } from './llm/types'
import type { Figure, SessionState } from './types'

export type CallbackDeps = { explainer: Explainer }

export type CallbackResult = { state: SessionState; figure: Figure }

export type ResetResult = { state: null; figure: Figure; placeholder: string }

const ModeSchema = v.picklist(['short', 'long'], 'mode must be "short" or "long"')

const TopicSubmitSchema = v.object({
  topic: v.pipe(v.string('topic must be a string'), v.trim(), v.nonEmpty('Topic must not be empty')),
  mode: v.optional(ModeSchema, 'short'),
})

const NodeClickSchema = v.object({
  state: v.unknown(),
  nodeId: v.pipe(v.string('nodeId must be a string'), v.nonEmpty('nodeId must not be empty')),
  choice: v.picklist(['known', 'unknown'], 'choice must be "known" or "unknown"'),
})

const LengthSchema = v.object({ state: v.unknown(), mode: ModeSchema })

const StateOnlySchema = v.object({ state: v.unknown() })

const UploadSchema = v.object({
  contents: v.pipe(v.string('contents must be a string'), v.nonEmpty('Upload is empty')),
})

function parseInput<TSchema extends v.GenericSchema>(schema: TSchema, body: unknown): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, body ?? {})
  if (!result.success) throw new InvalidInputError(result.issues[0].message)
  return result.output
}

function render(state: SessionState, flashId?: string): CallbackResult {
  return { state, figure: autoscaleFigure(generateFigure(state, { flashId })) }
}

export function handleReset(): ResetResult {
  const { state, placeholder } = initialSession()
  return { state, figure: autoscaleFigure(generateFigure(state)), placeholder }
}

export async function handleTopicSubmit(body: unknown, deps: CallbackDeps): Promise<CallbackResult> {
  const { topic, mode } = parseInput(TopicSubmitSchema, body)
  return render(await createNewConceptMap(topic, mode, deps.explainer))
}

export async function handleNodeClick(body: unknown, deps: CallbackDeps): Promise<CallbackResult> {
  const input = parseInput(NodeClickSchema, body)
  const state = parseSessionState(input.state)
  const next = await expandConceptMap(state, input.nodeId, input.choice, deps.explainer)
  return render(next, next === state ? undefined : input.nodeId)
}

export async function handleLengthToggle(body: unknown, deps: CallbackDeps): Promise<CallbackResult> {
  const input = parseInput(LengthSchema, body)
  return render(await updateExplanationLength(parseSessionState(input.state), input.mode, deps.explainer))
}

export async function handleReload(body: unknown, deps: CallbackDeps): Promise<CallbackResult> {
  const input = parseInput(StateOnlySchema, body)
  return render(await reloadExplanation(parseSessionState(input.state), deps.explainer))
}

export async function handleSuggestions(body: unknown, deps: CallbackDeps): Promise<{ suggestions: string[] }> {
  const input = parseInput(StateOnlySchema, body)
  const state = input.state == null ? null : parseSessionState(input.state)
  return { suggestions: await suggestTopics(state, deps.explainer) }
}

export function handleDownload(body: unknown): { filename: string; content: string } {
  const state = parseSessionState(parseInput(StateOnlySchema, body).state)
  return { filename: sessionFilename(state), content: exportSession(state) }
}

export function handleUpload(body: unknown): CallbackResult {
  const { contents } = parseInput(UploadSchema, body)
  return render(importSession(contents))
}
