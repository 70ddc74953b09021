import { describe, it, test, expect } from 'vitest'
import { trainModel } from '../lib/viterbi/trainer.js'
import { correctText, correctWord } from '../lib/corrector.js'
import { correctLinesFromAsyncIterable } from '../lib/viterbi/streaming.js'
import { evaluateCorrections } from '../lib/evaluate.js'
import type { TrainingPair } from '../lib/types.js'

const pairs: TrainingPair[] = [
  { correct: 'cat', typed: 'cat' },
  { correct: 'cat', typed: 'cet' },
  { correct: 'dog', typed: 'dgo' }
]
const model = trainModel(pairs)

describe('correctWord', () => {
  it('decodes and snaps a misspelling seen in training', () => {
    expect(correctWord('cet', model)).toBe('cat')
    expect(correctWord('dgo', model)).toBe('dog')
  })

  it('lowercases its input', () => {
    expect(correctWord('CeT', model)).toBe('cat')
  })

  it('always answers with a known word', () => {
    for (const w of ['xyz', 'q', 'doggo', 'kat']) {
      expect(['cat', 'dog']).toContain(correctWord(w, model))
    }
  })

  it('returns the raw decoded candidate when nothing was learned', () => {
    expect(correctWord('xyz', trainModel([]))).toBe('aaa')
  })
})

describe('correctText', () => {
  it('corrects each word and joins with single spaces', () => {
    expect(correctText('Cet  CAT\tdgo', model)).toBe('cat cat dog')
  })

  it('returns an empty string for blank text', () => {
    expect(correctText('   ', model)).toBe('')
  })

  it('is deterministic across runs and word order', () => {
    const a = correctText('xyz abc', trainModel(pairs))
    const b = correctText('xyz abc', trainModel(pairs))
    expect(a).toBe(b)
    expect(correctText('abc xyz', model).split(' ')).toEqual(a.split(' ').reverse())
  })
})

test('correctLinesFromAsyncIterable yields one corrected line per input line', async () => {
  async function* chunks() {
    yield 'Cet d'
    yield 'go\n\nCAT'
  }

  const out: string[] = []
  for await (const line of correctLinesFromAsyncIterable(chunks(), model)) out.push(line)

  expect(out).toEqual(['cat dog', '', 'cat'])
})

describe('evaluateCorrections', () => {
  it('counts hits and lists misses in order', () => {
    const report = evaluateCorrections(model, [
      { correct: 'cat', typed: 'cet' },
      { correct: 'dog', typed: 'dgo' },
      { correct: 'cat', typed: 'kat' },
      { correct: 'dog', typed: 'cat' }
    ])

    expect(report.total).toBe(4)
    expect(report.correct).toBe(3)
    expect(report.accuracy).toBe(0.75)
    expect(report.misses).toEqual([{ typed: 'cat', expected: 'dog', actual: 'cat' }])
  })

  it('reports zero accuracy for no pairs', () => {
    expect(evaluateCorrections(model, [])).toEqual({ total: 0, correct: 0, accuracy: 0, misses: [] })
  })
})
