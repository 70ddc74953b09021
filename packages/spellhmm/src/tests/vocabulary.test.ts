import { describe, it, test, expect } from 'vitest'
import { positionalDistance, snapToVocabulary } from '../lib/vocabulary.js'

describe('snapToVocabulary', () => {
  it('returns an exact member unchanged', () => {
    expect(snapToVocabulary('cat', new Set(['cat', 'car', 'bat']))).toBe('cat')
  })

  it('breaks distance ties by vocabulary order', () => {
    expect(snapToVocabulary('cet', new Set(['cat', 'cot', 'cap']))).toBe('cat')
    expect(snapToVocabulary('cet', new Set(['cot', 'cat', 'cap']))).toBe('cot')
  })

  it('returns the candidate when the vocabulary is empty', () => {
    expect(snapToVocabulary('xyz', new Set())).toBe('xyz')
  })

  it('charges the length difference', () => {
    expect(snapToVocabulary('cats', new Set(['dog', 'cat']))).toBe('cat')
  })

  it('compares positions without shifting', () => {
    // an edit distance would pick 'cat' (one deletion); positional distance prefers 'xcab'
    expect(snapToVocabulary('xcat', new Set(['cat', 'xcab']))).toBe('xcab')
  })
})

test('positionalDistance adds length difference to same-index mismatches', () => {
  expect(positionalDistance('cat', 'cat')).toBe(0)
  expect(positionalDistance('cat', 'cet')).toBe(1)
  expect(positionalDistance('cap', 'cet')).toBe(2)
  expect(positionalDistance('xcat', 'cat')).toBe(4)
  expect(positionalDistance('', 'abc')).toBe(3)
})
