import { test, expect } from 'vitest'
import { Document } from '../lib/document.js'
import { isPreconditionError } from '../lib/errors.js'
import type { FieldRecord } from '../lib/types.js'

// tokenizer output: the contraction is flagged but not yet split
function tokenized(): FieldRecord[][] {
  return [
    [
      { id: '1', text: 'Il' },
      { id: '2', text: 'va' },
      { id: '3', text: 'au', misc: 'MWT=Yes' },
      { id: '4', text: 'marché' }
    ],
    [
      { id: '1', text: 'Je' },
      { id: '2', text: 'mange' },
      { id: '3', text: 'du', misc: 'SpaceAfter=No|MWT=Yes' },
      { id: '4', text: 'pain' }
    ]
  ]
}

test('lists unexpanded multi-word tokens for evaluation', () => {
  const doc = new Document(tokenized())
  expect(doc.getMwtExpansions(true)).toEqual(['au', 'du'])
  expect(doc.numWords).toBe(6)
})

test('setMwtExpansions splits tokens into words and renumbers ids', () => {
  const doc = new Document(tokenized())
  doc.setMwtExpansions(['à le', 'de  le'])

  expect(doc.numWords).toBe(10)
  expect(doc.get(['text'], true)).toEqual([
    ['Il', 'va', 'à', 'le', 'marché'],
    ['Je', 'mange', 'de', 'le', 'pain']
  ])
  expect(doc.get(['id'], true)).toEqual([
    ['1', '2', '3', '4', '5'],
    ['1', '2', '3', '4', '5']
  ])

  const au = doc.sentences[0]!.tokens[2]!
  expect(au.id).toBe('3-4')
  expect(au.misc).toBeUndefined()
  expect(au.words.map(w => w.parent === au)).toEqual([true, true])

  const du = doc.sentences[1]!.tokens[2]!
  expect(du.id).toBe('3-4')
  expect(du.misc).toBe('SpaceAfter=No')
})

test('getMwtExpansions returns the supplied expansions after expanding', () => {
  const doc = new Document(tokenized())
  const expansions = ['à le', 'de le']
  doc.setMwtExpansions(expansions)
  expect(doc.getMwtExpansions()).toEqual([['au', 'à le'], ['du', 'de le']])
  expect(doc.getMwtExpansions().map(([, dst]) => dst)).toEqual(expansions)
})

test('serialized form of an expanded document uses range ids', () => {
  const doc = new Document([tokenized()[0]!])
  doc.setMwtExpansions(['à le'])
  expect(doc.toDict()).toEqual([[
    { id: '1', text: 'Il' },
    { id: '2', text: 'va' },
    { id: '3-4', text: 'au' },
    { id: '3', text: 'à' },
    { id: '4', text: 'le' },
    { id: '5', text: 'marché' }
  ]])
})

test('expansion count mismatch fails without changing the document', () => {
  const doc = new Document(tokenized())
  let caught: unknown
  try {
    doc.setMwtExpansions(['à le'])
  } catch (err) {
    caught = err
  }
  expect(isPreconditionError(caught, 'EXPANSION_COUNT')).toBe(true)
  expect(doc.numWords).toBe(6)
  expect(doc.sentences[0]!.tokens[2]!.misc).toBe('MWT=Yes')
})

test('an expansion without words is rejected', () => {
  const doc = new Document(tokenized())
  expect(() => doc.setMwtExpansions(['à le', '  '])).toThrowError(/Expansion 1 has no words/)
  expect(doc.numWords).toBe(6)
})

test('renumbering clears dependency information', () => {
  const doc = new Document([[
    { id: '1', text: 'Il', head: 2, deprel: 'nsubj' },
    { id: '2', text: 'dort', head: 0, deprel: 'root' }
  ]])
  expect(doc.sentences[0]!.dependencies).toHaveLength(2)

  doc.setMwtExpansions([])
  expect(doc.get(['head', 'deprel'])).toEqual([[undefined, undefined], [undefined, undefined]])
  expect(doc.sentences[0]!.dependencies).toEqual([])
  expect(doc.sentences[0]!.dependencyState).toBe('incomplete')
})

test('gold range tokens report their existing expansion', () => {
  const doc = new Document([[
    { id: '1', text: 'Je' },
    { id: '2-3', text: 'du' },
    { id: '2', text: 'de' },
    { id: '3', text: 'le' },
    { id: '4', text: 'pain' }
  ]])
  expect(doc.getMwtExpansions()).toEqual([['du', 'de le']])
  expect(doc.getMwtExpansions(true)).toEqual(['du'])
})

test('expanding a range token replaces its words', () => {
  const doc = new Document([[
    { id: '1-2', text: 'del' },
    { id: '1', text: 'de' },
    { id: '2', text: 'el' },
    { id: '3', text: 'mar' }
  ]])
  doc.setMwtExpansions(['d el'])
  expect(doc.get(['text'])).toEqual(['d', 'el', 'mar'])
  expect(doc.getMwtExpansions()).toEqual([['del', 'd el']])
})

test('a one-word expansion keeps the token offsets and sentence text', () => {
  const doc = new Document([[
    { id: '1', text: 'Il', misc: 'start_char=0|end_char=2' },
    { id: '2', text: 'y', misc: 'start_char=3|end_char=4|MWT=Yes' }
  ]], 'Il y')
  doc.setMwtExpansions(['y'])

  const sentence = doc.sentences[0]!
  expect(sentence.text).toBe('Il y')
  const y = sentence.tokens[1]!
  expect(y.id).toBe('2')
  expect(y.startChar).toBe(3)
  expect(y.endChar).toBe(4)
  expect(y.misc).toBe('start_char=3|end_char=4')
  expect(doc.get(['start_char', 'end_char'])).toEqual([[0, 2], [3, 4]])
  expect(doc.getMwtExpansions()).toEqual([])
})

test('expansion marks previously built entities stale', () => {
  const doc = new Document([[
    { id: '1', text: 'Paris', ner: 'S-LOC' },
    { id: '2', text: 'au', misc: 'MWT=Yes' }
  ]])
  doc.buildEnts()
  expect(doc.entitiesState).toBe('fresh')
  doc.setMwtExpansions(['à le'])
  expect(doc.entitiesState).toBe('stale')
})
