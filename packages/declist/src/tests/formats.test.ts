import { describe, it, expect } from 'vitest'
import { formatLabelling, parseLabelLines, parseTestLines, parseTrainingLines } from '../lib/formats.js'
import { MalformedLineError } from '../lib/errors.js'

describe('training lines', () => {
  it('reads id, class and text, skipping blank lines', () => {
    const docs = parseTrainingLines(['cv001.txt 1 great fun .', '', 'cv002.txt 0 dull'], 'train.txt')
    expect(docs).toEqual([
      { id: 'cv001.txt', positive: true, text: 'great fun .' },
      { id: 'cv002.txt', positive: false, text: 'dull' }
    ])
  })

  it('keeps paragraph and line separators inside the review text', () => {
    expect(parseTrainingLines(['r1 1 great\u2028film'], 'train.txt'))
      .toEqual([{ id: 'r1', positive: true, text: 'great\u2028film' }])
    expect(parseTestLines(['t1 __ great\u2029film'], 'test.txt')).toEqual([{ id: 't1', text: 'great\u2029film' }])
  })

  it('accepts an empty review', () => {
    expect(parseTrainingLines(['cv003.txt 1'], 'train.txt')).toEqual([{ id: 'cv003.txt', positive: true, text: '' }])
  })

  it('names the file and line of a malformed entry', () => {
    const parse = () => parseTrainingLines(['ok 1 fine', 'bad 2 class'], 'train.txt')
    expect(parse).toThrow(MalformedLineError)
    expect(parse).toThrow('train.txt:2: expected "<id> <0|1> <text>": "bad 2 class"')
  })
})

describe('test lines', () => {
  it('reads id and text', () => {
    expect(parseTestLines(['cv9.txt __ so so'], 'test.txt')).toEqual([{ id: 'cv9.txt', text: 'so so' }])
  })

  it('rejects a labelled line', () => {
    expect(() => parseTestLines(['cv9.txt 1 so so'], 'test.txt')).toThrow(MalformedLineError)
  })

  it('rejects duplicate ids', () => {
    expect(() => parseTestLines(['x __ a', 'x __ b'], 'test.txt')).toThrow('test.txt:2: duplicate id x')
  })
})

describe('label lines', () => {
  it('reads labels in file order and writes them back', () => {
    const labels = parseLabelLines(['b 1', 'a  0 ', ''], 'gold.txt')
    expect([...labels]).toEqual([['b', true], ['a', false]])
    expect(formatLabelling(labels)).toEqual(['b 1', 'a 0'])
  })

  it('rejects a missing class', () => {
    expect(() => parseLabelLines(['lonely'], 'gold.txt')).toThrow('gold.txt:1: expected "<id> <0|1>"')
  })

  it('rejects duplicate ids', () => {
    expect(() => parseLabelLines(['a 1', 'a 0'], 'gold.txt')).toThrow(MalformedLineError)
  })
})
