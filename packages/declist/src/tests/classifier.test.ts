import { describe, it, expect } from 'vitest'
import { classifyDocument, classifyDocuments, containsFeature, prepareDocument } from '../lib/classifier.js'
import { resolveConfig } from '../lib/prebuilt.js'
import type { DecisionList } from '../lib/types.js'

const list: DecisionList = [
  { feature: 'great', classification: true },
  { feature: 'bad', classification: false }
]

const prepared = (text: string) => prepareDocument({ id: 'doc', text })

describe('prepareDocument', () => {
  it('filters, scopes negation and pads the joined sentences', () => {
    const doc = prepareDocument({ id: 'cv1', text: 'I did not like the film . Great cast !' })
    expect(doc).toEqual({ id: 'cv1', text: ' I did not NOT_like NOT_film Great cast ! ' })
  })

  it('pads an empty document to a single space pair', () => {
    expect(prepared('. , ;').text).toBe('  ')
  })
})

describe('containsFeature', () => {
  it('matches whole tokens only', () => {
    expect(containsFeature(prepared('greatest hits'), 'great')).toBe(false)
    expect(containsFeature(prepared('so great'), 'great')).toBe(true)
  })

  it('matches the first and last token of the document', () => {
    expect(containsFeature(prepared('great'), 'great')).toBe(true)
  })

  it('matches bigrams and negated features', () => {
    const doc = prepared("great cast . didn't care")
    expect(containsFeature(doc, 'great cast')).toBe(true)
    expect(containsFeature(doc, 'NOT_care')).toBe(true)
    expect(containsFeature(doc, 'care')).toBe(false)
  })
})

describe('classifyDocument', () => {
  it('returns the class of the highest-ranked match', () => {
    expect(classifyDocument(list, prepared('bad plot but great music'), false)).toBe(true)
    expect(classifyDocument(list, prepared('great music but bad plot'), false)).toBe(true)
    expect(classifyDocument(list, prepared('just bad'), true)).toBe(false)
  })

  it('falls back when nothing matches', () => {
    expect(classifyDocument(list, prepared('nothing to see'), false)).toBe(false)
    expect(classifyDocument(list, prepared('nothing to see'), true)).toBe(true)
    expect(classifyDocument([], prepared('great'), true)).toBe(true)
  })
})

describe('classifyDocuments', () => {
  const docs = [
    { id: 'b', text: 'great fun' },
    { id: 'a', text: 'no opinion' }
  ]

  it('defaults unmatched documents to the negative class', () => {
    const labels = classifyDocuments(list, docs)
    expect([...labels]).toEqual([['b', true], ['a', false]])
  })

  it('honours a configured fallback', () => {
    const labels = classifyDocuments(list, docs, resolveConfig({ fallbackClass: true }))
    expect(labels.get('a')).toBe(true)
  })
})
