import { describe, expect, it } from 'vitest'

import { cleanLabel, conceptKey } from '../src/concept-map/labels'
import { ReplyParseError, extractJson, parseExplanation, parseTopicList, toMetric } from '../src/llm/parse'
import { buildExplainMessages, buildTopicSuggestionMessages } from '../src/llm/prompts'

describe('cleanLabel', () => {
  it('strips list markers, quotes and a trailing period', () => {
    expect(cleanLabel('  1. "Group theory".  ')).toBe('Group theory')
    expect(cleanLabel('- vectors')).toBe('vectors')
    expect(cleanLabel('• Ｆｏｕｒｉｅｒ')).toBe('Fourier')
  })

  it('strips nested markers and quotes in one call', () => {
    expect(cleanLabel('- 1. foo')).toBe('foo')
    expect(cleanLabel('"- item".')).toBe('item')
    for (const raw of ['- 1. foo', '* "2) bar"', '1. - "baz."']) {
      expect(cleanLabel(cleanLabel(raw))).toBe(cleanLabel(raw))
    }
  })

  it('collapses inner whitespace', () => {
    expect(cleanLabel('linear \n  algebra')).toBe('linear algebra')
  })

  it('keys labels case-insensitively', () => {
    expect(conceptKey('  Linear   Algebra ')).toBe('linear algebra')
    expect(conceptKey('"Linear algebra."')).toBe(conceptKey('linear algebra'))
  })
})

describe('extractJson', () => {
  it('finds the object inside fences and prose', () => {
    expect(extractJson('Sure!\n```json\n{"a": 1}\n```')).toEqual({ a: 1 })
    expect(extractJson('list: ["x", "y"] done')).toEqual(['x', 'y'])
  })

  it('rejects replies without JSON', () => {
    expect(() => extractJson('sorry, I cannot help')).toThrow(ReplyParseError)
    expect(() => extractJson('sorry, I cannot help')).toThrow('model reply contains no JSON')
    expect(() => extractJson('{"explanation": }')).toThrow(/^model reply is not valid JSON/)
  })
})

describe('toMetric', () => {
  it('clamps to the unit interval and falls back on junk', () => {
    expect(toMetric(0.4, 0.5)).toBe(0.4)
    expect(toMetric('0.9', 0.5)).toBe(0.9)
    expect(toMetric(-3, 0.5)).toBe(0)
    expect(toMetric(7, 0.5)).toBe(1)
    expect(toMetric('wide', 0.5)).toBe(0.5)
    expect(toMetric(undefined, 0.5)).toBe(0.5)
  })
})

describe('parseExplanation', () => {
  const reply = [
    '```json',
    '{"explanation": " Quaternions are four numbers. ", "concepts": [',
    '  {"name": "- Vectors", "distance": 0.2, "breadth": "0.9"},',
    '  "vectors",',
    '  "Matrices",',
    '  {"label": "Spin", "distance": 7}',
    ']}',
    '```',
  ].join('\n')

  it('cleans, dedupes and scores the suggested concepts', () => {
    expect(parseExplanation(reply, 5)).toEqual({
      explanation: 'Quaternions are four numbers.',
      suggestedConcepts: [
        { label: 'Vectors', distance: 0.2, breadth: 0.9 },
        { label: 'Matrices', distance: 0.5, breadth: 0.5 },
        { label: 'Spin', distance: 1, breadth: 0.5 },
      ],
    })
  })

  it('keeps only as many concepts as were asked for', () => {
    expect(parseExplanation(reply, 1).suggestedConcepts.map(c => c.label)).toEqual(['Vectors'])
  })

  it('treats a missing concept list as empty', () => {
    expect(parseExplanation('{"explanation": "x"}', 3)).toEqual({ explanation: 'x', suggestedConcepts: [] })
  })

  it('rejects a reply without an explanation', () => {
    expect(() => parseExplanation('{"concepts": []}', 3)).toThrow(/^model reply has the wrong shape/)
    expect(() => parseExplanation('{"explanation": "   "}', 3)).toThrow('model reply has the wrong shape: explanation is empty')
  })
})

describe('parseTopicList', () => {
  it('reads the topics object', () => {
    expect(parseTopicList('{"topics": ["Octonions", "octonions", " Lie groups. "]}', 4)).toEqual(['Octonions', 'Lie groups'])
  })

  it('reads a bare array and caps it', () => {
    expect(parseTopicList('["a", "b", "c"]', 2)).toEqual(['a', 'b'])
  })

  it('falls back to a plain list', () => {
    expect(parseTopicList('spinors, Clifford algebras\nrotations', 4)).toEqual(['spinors', 'Clifford algebras', 'rotations'])
  })
})

describe('prompts', () => {
  it('describes the learner and asks for new concepts around the focus', () => {
    const [system, user] = buildExplainMessages({
      topic: 'quaternions',
      known: ['linear algebra'],
      unknown: [],
      mode: 'short',
      focus: 'linear algebra',
      exclude: ['quaternions', 'linear algebra'],
      maxConcepts: 3,
    })
    expect(system.role).toBe('system')
    expect(user.content.split('\n')).toEqual([
      'Topic to explain: "quaternions".',
      'Concepts the learner understands: "linear algebra".',
      'Concepts the learner does not understand: (none yet).',
      'The learner has just told you about "linear algebra"; take it into account explicitly.',
      'Keep the explanation to one concise paragraph of at most 120 words.',
      'In "concepts", give exactly 3 concepts that are necessary to understand "linear algebra".',
      'Do not suggest any of: "quaternions", "linear algebra".',
    ])
  })

  it('asks for no concepts when only the text is needed', () => {
    const [, user] = buildExplainMessages({ topic: 't', known: [], unknown: [], mode: 'long', maxConcepts: 0 })
    expect(user.content.split('\n').at(-1)).toBe('Return "concepts" as an empty array.')
  })

  it('asks for a fixed number of follow-up topics', () => {
    const [, user] = buildTopicSuggestionMessages({ known: ['a'], unknown: ['b'], maxTopics: 4 })
    expect(user.content).toBe([
      'The learner knows: "a".',
      'The learner does not know yet: "b".',
      'Suggest 4 short topic names (one to four words each) worth exploring next.',
    ].join('\n'))
  })
})
