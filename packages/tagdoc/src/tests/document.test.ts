import { readFileSync } from 'fs'
import { describe, it, expect } from 'vitest'
import { Document } from '../lib/document.js'
import { FIELD_NAMES, WORD_FIELDS, type FieldName } from '../lib/types.js'
import { validateDocumentFile } from '../lib/fields.js'
import { isPreconditionError } from '../lib/errors.js'
import { caseFilePath, wordsOf } from './test-helpers.js'

function loadNews(): Document {
  const { text, sentences } = validateDocumentFile(JSON.parse(readFileSync(caseFilePath('news.json'), 'utf8')))
  return new Document(sentences, text)
}

describe('construction', () => {
  it('counts words across sentences', () => {
    const doc = loadNews()
    expect(doc.sentences).toHaveLength(2)
    expect(doc.numWords).toBe(10)
  })

  it('slices sentence text from the raw text using token offsets', () => {
    const doc = loadNews()
    expect(doc.sentences.map(s => s.text)).toEqual(['Barack Obama visited Paris.', 'He met Angela Merkel.'])
  })

  it('leaves sentence text unset without raw text', () => {
    const doc = new Document([wordsOf('a', 'b')])
    expect(doc.sentences[0]!.text).toBeUndefined()
  })

  it('builds dependency graphs only where heads are complete', () => {
    const doc = loadNews()
    expect(doc.sentences.map(s => s.dependencyState)).toEqual(['built', 'incomplete'])
  })

  it('rejects malformed input', () => {
    const input = JSON.parse('[[{ "id": "1", "text": ["a"] }]]')
    expect(() => new Document(input)).toThrowError(/Invalid document input/)
  })
})

describe('get and set', () => {
  it('returns one entry per word for every field', () => {
    const doc = loadNews()
    for (const f of WORD_FIELDS) {
      expect(doc.get([f])).toHaveLength(doc.numWords)
    }
  })

  it('returns one entry per word for token offsets and entity type too', () => {
    const doc = loadNews()
    for (const f of FIELD_NAMES) {
      expect(doc.get([f])).toHaveLength(doc.numWords)
    }
  })

  it('reads offsets from each word token', () => {
    const doc = new Document([[{ id: '1', text: 'a', misc: 'start_char=0|end_char=1' }]], 'a')
    expect(doc.get(['start_char'])).toEqual([0])
    expect(doc.get(['end_char', 'type'])).toEqual([[1, undefined]])
    expect(loadNews().get(['start_char']).slice(0, 3)).toEqual([0, 7, 13])
  })

  it('fails on a field name it does not know', () => {
    const doc = new Document([wordsOf('a')])
    const fields: FieldName[] = JSON.parse('["colour"]')
    let caught: unknown
    try {
      doc.get(fields)
    } catch (err) {
      caught = err
    }
    expect(isPreconditionError(caught, 'UNKNOWN_FIELD')).toBe(true)
  })

  it('refuses to write fields that words do not own', () => {
    const doc = new Document([wordsOf('a')])
    const fields: Parameters<Document['set']>[0] = JSON.parse('["start_char"]')
    expect(() => doc.set(fields, [3])).toThrowError(/Cannot set field "start_char" on words/)
  })

  it('projects one field as scalars in word order', () => {
    const doc = loadNews()
    expect(doc.get(['text'])).toEqual(['Barack', 'Obama', 'visited', 'Paris', '.', 'He', 'met', 'Angela', 'Merkel', '.'])
    expect(doc.get(['lemma']).slice(0, 3)).toEqual([undefined, undefined, 'visit'])
  })

  it('projects several fields as tuples grouped by sentence', () => {
    const doc = loadNews()
    const grouped = doc.get(['text', 'upos'], true)
    expect(grouped).toHaveLength(2)
    expect(grouped[1]).toEqual([['He', 'PRON'], ['met', 'VERB'], ['Angela', 'PROPN'], ['Merkel', 'PROPN'], ['.', 'PUNCT']])
  })

  it('fails on an empty field list', () => {
    const doc = loadNews()
    expect(() => doc.get([])).toThrowError(/at least one field/)
    expect(() => doc.set([], [])).toThrowError(/at least one field/)
  })

  it('round trips a single field', () => {
    const doc = loadNews()
    const xpos = ['NNP', 'NNP', 'VBD', 'NNP', '.', 'PRP', 'VBD', 'NNP', 'NNP', '.']
    doc.set(['xpos'], xpos)
    expect(doc.get(['xpos'])).toEqual(xpos)
  })

  it('round trips several fields', () => {
    const doc = new Document([wordsOf('a', 'b'), wordsOf('c')])
    const rows = [['x', 'NOUN'], ['y', 'VERB'], ['z', 'ADJ']]
    doc.set(['lemma', 'upos'], rows)
    expect(doc.get(['lemma', 'upos'])).toEqual(rows)
  })

  it('fails when the content count differs from the word count', () => {
    const doc = loadNews()
    let caught: unknown
    try {
      doc.set(['upos'], ['NOUN'])
    } catch (err) {
      caught = err
    }
    expect(isPreconditionError(caught, 'CONTENT_COUNT')).toBe(true)
  })

  it('fails on rows of the wrong shape', () => {
    const doc = new Document([wordsOf('a', 'b')])
    expect(() => doc.set(['lemma', 'upos'], [['x', 'NOUN'], 'y'])).toThrowError(/entry 1 must hold 2 values/)
    expect(() => doc.set(['lemma'], [['x'], 'y'])).toThrowError(/entry 0 must be a single value/)
  })

  it('leaves every word untouched when one value is rejected', () => {
    const doc = new Document([[
      { id: '1', text: 'a', head: 0, deprel: 'root' },
      { id: '2', text: 'b', head: 1, deprel: 'dep' }
    ]])
    expect(() => doc.set(['head'], [2, 'bad'])).toThrowError(/head must be an integer/)
    expect(doc.get(['head'])).toEqual([0, 1])
    expect(doc.sentences[0]!.dependencyState).toBe('built')
  })

  it('marks dependency graphs stale when heads change', () => {
    const doc = loadNews()
    doc.set(['head'], [2, 3, 0, 3, 3, 2, 0, 4, 2, 2])
    expect(doc.sentences.map(s => s.dependencyState)).toEqual(['stale', 'stale'])
  })

  it('treats the null sentinel as unset when writing', () => {
    const doc = new Document([wordsOf('a', 'b')])
    doc.set(['upos'], ['_', 'NOUN'])
    expect(doc.get(['upos'])).toEqual([undefined, 'NOUN'])
  })
})

describe('iteration and serialization', () => {
  it('iterates words and tokens lazily and restartably', () => {
    const doc = new Document([
      [{ id: '1-2', text: 'du' }, { id: '1', text: 'de' }, { id: '2', text: 'le' }],
      wordsOf('pain')
    ])
    expect([...doc.iterWords()].map(w => w.text)).toEqual(['de', 'le', 'pain'])
    expect([...doc.iterWords()]).toHaveLength(3)
    expect([...doc.iterTokens()].map(t => t.text)).toEqual(['du', 'pain'])
  })

  it('serializes to the construction shape', () => {
    const input = [
      [{ id: '1-2', text: 'du' }, { id: '1', text: 'de', upos: 'ADP' }, { id: '2', text: 'le', upos: 'DET' }],
      [{ id: '1', text: 'pain', misc: 'start_char=0|end_char=4' }]
    ]
    expect(new Document(input).toDict()).toEqual(input)
  })

  it('reconstructs an equivalent document from its serialized form', () => {
    const doc = loadNews()
    const copy = new Document(doc.toDict(), doc.text)
    expect(copy.numWords).toBe(doc.numWords)
    expect(copy.sentences.map(s => s.tokens.length)).toEqual(doc.sentences.map(s => s.tokens.length))
    expect(copy.get([...WORD_FIELDS])).toEqual(doc.get([...WORD_FIELDS]))
    expect(copy.sentences.map(s => s.text)).toEqual(doc.sentences.map(s => s.text))
  })

  it('renders itself as JSON', () => {
    const doc = new Document([wordsOf('hi')])
    expect(JSON.parse(doc.toString())).toEqual([[{ id: '1', text: 'hi' }]])
    expect(JSON.stringify(doc)).toBe('[[{"id":"1","text":"hi"}]]')
  })
})
