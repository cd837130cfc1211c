import { test, expect } from 'vitest'
import {
  classifyDocuments, evaluate, formatDecisionList, parseDecisionList, resolveConfig, trainDecisionList
} from '../index.js'

test('the public API trains, reloads, classifies and scores a corpus', () => {
  const config = resolveConfig({ counting: { kind: 'hybrid', cap: 2 }, threshold: 1 })
  const { decisions } = trainDecisionList([
    { id: 'p1', positive: true, text: 'superb ! superb ! superb !' },
    { id: 'n1', positive: false, text: "didn't work . awful" }
  ], config)

  const reloaded = parseDecisionList(formatDecisionList(decisions, config), 'list.txt')
  expect(reloaded[0]).toEqual({ feature: 'superb', classification: true })

  const system = classifyDocuments(reloaded, [
    { id: 'a', text: 'superb acting' },
    { id: 'b', text: 'just awful' },
    { id: 'c', text: 'it works' }
  ], config)
  expect([...system]).toEqual([['a', true], ['b', false], ['c', false]])

  const report = evaluate(new Map([['a', true], ['b', false], ['c', true]]), system)
  expect(report.confusion).toEqual({ truePositive: 1, falsePositive: 0, falseNegative: 1, trueNegative: 1 })
  expect(report.precision).toBe(1)
  expect(report.recall).toBe(0.5)
})
