import { HOW_IT_WORKS_MD, LLM_CONFIG } from '../config'
import { InvalidInputError } from '../errors'
import type { Explainer, ExplainRequest, SuggestedConcept } from '../llm/types'
import type { Assessment, ConceptNode, ConceptStatus, ExplanationMode, SessionState } from '../types'
import { cleanLabel, conceptKey } from './labels'

// Every operation returns a new session value and leaves its input untouched,
// so a failed LLM call simply means the caller keeps the state it had.

function restingStatus(node: ConceptNode): ConceptStatus {
  return node.assessment ?? 'unexplored'
}

function makeConcept(concept: SuggestedConcept, parentId: string): ConceptNode {
  return {
    id: conceptKey(concept.label),
    label: concept.label,
    status: 'unexplored',
    parentId,
    assessment: null,
    expanded: false,
    distance: concept.distance,
    breadth: concept.breadth,
  }
}

/** Appends suggestions under `parentId`, skipping any whose key is already taken. */
export function appendConcepts(nodes: ConceptNode[], parentId: string, concepts: SuggestedConcept[]): ConceptNode[] {
  const taken = new Set(nodes.map(n => n.id))
  const out = [...nodes]
  for (const c of concepts) {
    const label = cleanLabel(c.label)
    const id = conceptKey(label)
    if (!id || taken.has(id)) continue
    taken.add(id)
    out.push(makeConcept({ ...c, label }, parentId))
  }
  return out
}

function setCurrent(nodes: ConceptNode[], id: string): ConceptNode[] {
  return nodes.map(n => {
    if (n.id === id) return n.status === 'current' ? n : { ...n, status: 'current' }
    if (n.status === 'current') return { ...n, status: restingStatus(n) }
    return n
  })
}

export function rootNode(state: SessionState): ConceptNode | undefined {
  return state.nodes.find(n => n.parentId === null)
}

export function findNode(state: SessionState, id: string): ConceptNode | undefined {
  return state.nodes.find(n => n.id === id)
}

export function knownConcepts(state: SessionState): string[] {
  return state.nodes.filter(n => n.assessment === 'known').map(n => n.label)
}

export function unknownConcepts(state: SessionState): string[] {
  return state.nodes.filter(n => n.assessment === 'unknown').map(n => n.label)
}

export function hasValidConcept(state: SessionState | null | undefined): state is SessionState {
  return !!state && !!state.rootTopic && state.nodes.length > 0
}

function explanationRequest(state: SessionState, mode: ExplanationMode, maxConcepts: number): ExplainRequest {
  const current = findNode(state, state.currentConceptId)
  return {
    topic: state.rootTopic,
    known: knownConcepts(state),
    unknown: unknownConcepts(state),
    mode,
    focus: current && current.parentId !== null ? current.label : undefined,
    exclude: state.nodes.map(n => n.label),
    maxConcepts,
  }
}

// What the app shows before any topic is submitted.
export function initialSession(): { state: null; placeholder: string } {
  return { state: null, placeholder: HOW_IT_WORKS_MD }
}

export async function createNewConceptMap(topic: string, mode: ExplanationMode, explainer: Explainer): Promise<SessionState> {
  const label = cleanLabel(topic)
  const rootId = conceptKey(label)
  if (!rootId) throw new InvalidInputError('Topic must not be empty')

  const reply = await explainer.explain({
    topic: label,
    known: [],
    unknown: [],
    mode,
    exclude: [label],
    maxConcepts: LLM_CONFIG.starterTerms,
  })

  const root: ConceptNode = {
    id: rootId,
    label,
    status: 'current',
    parentId: null,
    assessment: null,
    expanded: true,
    distance: 0,
    breadth: 1,
  }
  console.log(`[state] new concept map for "${label}" with ${reply.suggestedConcepts.length} suggestions`)
  return {
    rootTopic: label,
    nodes: appendConcepts([root], rootId, reply.suggestedConcepts.slice(0, LLM_CONFIG.starterTerms)),
    currentConceptId: rootId,
    explanationText: reply.explanation,
    explanationMode: mode,
    explanationCache: { [mode]: reply.explanation },
  }
}

export async function expandConceptMap(state: SessionState, nodeId: string, choice: Assessment, explainer: Explainer): Promise<SessionState> {
  const target = findNode(state, nodeId)
  if (!target) throw new InvalidInputError(`Unknown concept: ${nodeId}`)
  if (target.parentId === null) throw new InvalidInputError('The topic itself cannot be marked known or unknown')
  if (target.expanded && target.assessment === choice) return state

  const assessed: SessionState = {
    ...state,
    nodes: setCurrent(
      state.nodes.map(n => (n.id === nodeId ? { ...n, assessment: choice } : n)),
      nodeId,
    ),
    currentConceptId: nodeId,
  }
  const reply = await explainer.explain(explanationRequest(assessed, state.explanationMode, LLM_CONFIG.furtherTerms))

  let nodes = assessed.nodes
  if (!target.expanded) {
    nodes = appendConcepts(
      nodes.map(n => (n.id === nodeId ? { ...n, expanded: true } : n)),
      nodeId,
      reply.suggestedConcepts.slice(0, LLM_CONFIG.furtherTerms),
    )
  }
  console.log(`[state] "${target.label}" marked ${choice}, ${nodes.length - state.nodes.length} new concepts`)
  return {
    ...assessed,
    nodes,
    explanationText: reply.explanation,
    explanationCache: { [state.explanationMode]: reply.explanation },
  }
}

export async function updateExplanationLength(state: SessionState, mode: ExplanationMode, explainer: Explainer): Promise<SessionState> {
  if (mode === state.explanationMode) return state
  const cached = state.explanationCache[mode]
  if (cached !== undefined) {
    return { ...state, explanationMode: mode, explanationText: cached }
  }
  const reply = await explainer.explain(explanationRequest(state, mode, 0))
  return {
    ...state,
    explanationMode: mode,
    explanationText: reply.explanation,
    explanationCache: { ...state.explanationCache, [mode]: reply.explanation },
  }
}

export async function reloadExplanation(state: SessionState, explainer: Explainer): Promise<SessionState> {
  const mode = state.explanationMode
  const reply = await explainer.explain(explanationRequest(state, mode, 0))
  return {
    ...state,
    explanationText: reply.explanation,
    explanationCache: { ...state.explanationCache, [mode]: reply.explanation },
  }
}

// Suggestions are decorative: a failure is logged and yields an empty list.
export async function suggestTopics(state: SessionState | null, explainer: Explainer): Promise<string[]> {
  if (!hasValidConcept(state)) return []
  const taken = new Set(state.nodes.map(n => n.id))
  try {
    const topics = await explainer.suggestTopics({
      known: knownConcepts(state),
      unknown: unknownConcepts(state),
      maxTopics: LLM_CONFIG.suggestionTerms,
    })
    return topics.filter(t => !taken.has(conceptKey(t))).slice(0, LLM_CONFIG.suggestionTerms)
  } catch (e) {
    console.warn('[state] topic suggestions unavailable:', e instanceof Error ? e.message : e)
    return []
  }
}

/** Returns the first broken invariant, or null when the session is consistent. */
export function findInvariantViolation(state: SessionState): string | null {
  if (!state.rootTopic.trim()) return 'rootTopic is empty'
  if (state.nodes.length === 0) return 'session has no nodes'
  const seen = new Set<string>()
  for (const [i, n] of state.nodes.entries()) {
    if (seen.has(n.id)) return `duplicate node id "${n.id}"`
    if (i === 0 && n.parentId !== null) return 'first node must be the root'
    if (i > 0 && n.parentId === null) return `node "${n.id}" has no parent`
    if (n.parentId !== null && !seen.has(n.parentId)) return `node "${n.id}" refers to missing parent "${n.parentId}"`
    if (n.status === 'known' || n.status === 'unknown') {
      if (n.assessment !== n.status) return `node "${n.id}" status disagrees with its assessment`
    }
    if (n.status === 'unexplored' && n.assessment !== null) return `node "${n.id}" status disagrees with its assessment`
    seen.add(n.id)
  }
  const current = state.nodes.filter(n => n.status === 'current')
  if (current.length !== 1) return `expected exactly one current node, found ${current.length}`
  if (current[0].id !== state.currentConceptId) return 'currentConceptId does not match the current node'
  return null
}
