import { test, expect } from 'vitest'
import { readFileSync } from 'fs'
import { trainDecisionList } from '../lib/trainer.js'
import { parseTrainingLines } from '../lib/formats.js'
import { resolveConfig } from '../lib/prebuilt.js'
import { dataPath } from './test-helpers.js'

function loadTrainingFixture() {
  const file = dataPath('train.txt')
  return parseTrainingLines(readFileSync(file, 'utf8').split('\n'), file)
}

test('trainDecisionList ranks the fixture corpus', () => {
  const { decisions, documentCount, featureCount } = trainDecisionList(loadTrainingFixture())

  expect(documentCount).toBe(6)
  expect(featureCount).toBe(17)

  expect(decisions[0]).toEqual({ feature: 'great', classification: true, logLikelihood: 2 })
  expect(decisions[1]?.feature).toBe('dull')
  expect(decisions[1]?.classification).toBe(false)
  expect(decisions[1]?.logLikelihood).toBeCloseTo(Math.log2(3), 10)

  // the remaining features all score 1 and keep the order they were first seen in
  expect(decisions.slice(2).map(d => d.feature)).toEqual([
    'fun', 'great fun', 'cast', 'great cast',
    'really', '!', 'really great', 'great !',
    'plot', 'dull plot', 'slow', 'dull slow',
    'not', 'NOT_great', 'not NOT_great'
  ])
  expect(decisions.slice(2).every(d => d.logLikelihood === 1)).toBe(true)
})

test('negated tokens become their own features', () => {
  const { decisions } = trainDecisionList(loadTrainingFixture())
  expect(decisions.find(d => d.feature === 'NOT_great')?.classification).toBe(false)
})

test('frequency counting lets repetition raise confidence', () => {
  const docs = [{ id: 'r1', positive: true, text: 'great great' }]

  const frequency = trainDecisionList(docs, resolveConfig({ counting: { kind: 'frequency' } }))
  expect(frequency.decisions.map(d => d.feature)).toEqual(['great', 'great great'])
  expect(frequency.decisions[0]?.logLikelihood).toBeCloseTo(Math.log2(3), 10)

  const presence = trainDecisionList(docs, resolveConfig({ counting: { kind: 'presence' } }))
  expect(presence.decisions.map(d => d.logLikelihood)).toEqual([1, 1])
})

test('an empty corpus trains an empty list', () => {
  expect(trainDecisionList([])).toEqual({ decisions: [], documentCount: 0, featureCount: 0 })
})
