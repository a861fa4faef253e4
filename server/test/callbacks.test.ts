import { beforeEach, describe, expect, it, vi } from 'vitest'

import {
  handleDownload,
  handleLengthToggle,
  handleNodeClick,
  handleReload,
  handleReset,
  handleSuggestions,
  handleTopicSubmit,
  handleUpload,
} from '../src/callbacks'
import { HOW_IT_WORKS_MD } from '../src/config'
import { InvalidInputError, InvalidSessionFileError } from '../src/errors'
import { MockExplainer } from '../src/llm'

let deps: { explainer: MockExplainer }

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
  deps = { explainer: new MockExplainer() }
})

describe('handleReset', () => {
  it('clears the session and shows the introduction', () => {
    const result = handleReset()
    expect(result.state).toBeNull()
    expect(result.figure.nodes).toEqual([])
    expect(result.placeholder).toBe(HOW_IT_WORKS_MD)
  })
})

describe('handleTopicSubmit', () => {
  it('starts a map in short mode by default', async () => {
    const { state, figure } = await handleTopicSubmit({ topic: ' quaternions ' }, deps)
    expect(state.rootTopic).toBe('quaternions')
    expect(state.explanationMode).toBe('short')
    expect(state.nodes).toHaveLength(5)
    expect(figure.nodes.map(n => n.id)).toEqual(state.nodes.map(n => n.id))
    expect(figure.edges).toHaveLength(4)
  })

  it('validates the request body', async () => {
    await expect(handleTopicSubmit({ topic: '   ' }, deps)).rejects.toThrow(new InvalidInputError('Topic must not be empty'))
    await expect(handleTopicSubmit({ topic: 'q', mode: 'medium' }, deps)).rejects.toThrow('mode must be "short" or "long"')
    await expect(handleTopicSubmit(undefined, deps)).rejects.toBeInstanceOf(InvalidInputError)
    expect(deps.explainer.calls).toHaveLength(0)
  })
})

describe('handleNodeClick', () => {
  it('expands the clicked concept and flashes it', async () => {
    const { state } = await handleTopicSubmit({ topic: 'quaternions' }, deps)
    const result = await handleNodeClick({ state, nodeId: 'history of quaternions', choice: 'unknown' }, deps)

    expect(result.state.currentConceptId).toBe('history of quaternions')
    expect(result.state.nodes).toHaveLength(8)
    const flashed = result.figure.nodes.find(n => n.id === 'history of quaternions')
    expect(flashed?.size).toBeCloseTo(81.25)
    expect(flashed?.color).toBe('#ffffff')
  })

  it('does not flash when the click changes nothing', async () => {
    const { state } = await handleTopicSubmit({ topic: 'quaternions' }, deps)
    const first = await handleNodeClick({ state, nodeId: 'history of quaternions', choice: 'unknown' }, deps)
    const again = await handleNodeClick({ state: first.state, nodeId: 'history of quaternions', choice: 'unknown' }, deps)

    expect(again.state).toEqual(first.state)
    expect(again.figure.nodes.find(n => n.id === 'history of quaternions')?.size).toBeCloseTo(65)
    expect(deps.explainer.calls).toHaveLength(2)
  })

  it('rejects a bad choice or a tampered session', async () => {
    const { state } = await handleTopicSubmit({ topic: 'quaternions' }, deps)
    await expect(handleNodeClick({ state, nodeId: 'history of quaternions', choice: 'maybe' }, deps)).rejects.toThrow(
      'choice must be "known" or "unknown"',
    )
    await expect(handleNodeClick({ state: { ...state, nodes: [] }, nodeId: 'x', choice: 'known' }, deps)).rejects.toBeInstanceOf(
      InvalidSessionFileError,
    )
  })
})

describe('handleLengthToggle and handleReload', () => {
  it('switches to the long explanation and regenerates it on reload', async () => {
    const { state } = await handleTopicSubmit({ topic: 'quaternions' }, deps)
    const long = await handleLengthToggle({ state, mode: 'long' }, deps)
    expect(long.state.explanationText).toBe('[long] quaternions, for someone who knows nothing yet and does not know nothing yet.')
    expect(Object.keys(long.state.explanationCache).sort()).toEqual(['long', 'short'])

    const reloaded = await handleReload({ state: long.state }, deps)
    expect(reloaded.state.explanationMode).toBe('long')
    expect(deps.explainer.calls).toHaveLength(3)
  })
})

describe('handleSuggestions', () => {
  it('is empty before a map exists', async () => {
    expect(await handleSuggestions({ state: null }, deps)).toEqual({ suggestions: [] })
  })

  it('builds on what the learner has assessed', async () => {
    const { state } = await handleTopicSubmit({ topic: 'quaternions' }, deps)
    const clicked = await handleNodeClick({ state, nodeId: 'history of quaternions', choice: 'unknown' }, deps)
    expect(await handleSuggestions({ state: clicked.state }, deps)).toEqual({ suggestions: ['advanced history of quaternions'] })
  })
})

describe('handleDownload and handleUpload', () => {
  it('saves a session and loads it back', async () => {
    const { state } = await handleTopicSubmit({ topic: 'quaternions' }, deps)
    const file = handleDownload({ state })
    expect(file.filename).toBe('quaternions.concept-map.json')

    const loaded = handleUpload({ contents: file.content })
    expect(loaded.state).toEqual(state)
    expect(loaded.figure.nodes).toHaveLength(5)
  })

  it('rejects an empty upload', () => {
    expect(() => handleUpload({ contents: '' })).toThrow('Upload is empty')
  })
})
