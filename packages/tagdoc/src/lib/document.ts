import { config } from './config.js';
import { decodeEntities } from './entities.js';
import { PreconditionError } from './errors.js';
import { isFieldName, isMultiWordEntry, stripMwtMarker, validateDocumentInput } from './fields.js';
import { logger } from './logger.js';
import { Sentence } from './sentence.js';
import { Span } from './span.js';
import type { Token } from './token.js';
import {
  DEPREL, END_CHAR, HEAD, ID, NER, START_CHAR, TYPE,
  type BuildEntsOptions, type DocumentInput, type EntitiesState, type FieldName, type FieldRecord,
  type FieldValue, type MwtExpansion, type Projection, type WordField, type WordValue
} from './types.js';
import { Word, isWordField } from './word.js';

// writing any of these invalidates dependency graphs
const DEPENDENCY_FIELDS: ReadonlySet<WordField> = new Set<WordField>([ID, HEAD, DEPREL]);

function isMultiWordToken(token: Token): boolean {
  return isMultiWordEntry(token.id, token.misc);
}

function splitExpansion(expansion: string): string[] {
  return expansion.split(/\s+/).filter(x => x.length > 0);
}

function requireFields(fields: readonly string[], accepts: (name: string) => boolean, action: string): void {
  if (fields.length === 0) {
    throw new PreconditionError('EMPTY_FIELDS', 'Must have at least one field');
  }
  const unknown = fields.find(f => !accepts(f));
  if (unknown !== undefined) {
    throw new PreconditionError('UNKNOWN_FIELD', `Cannot ${action} field ${JSON.stringify(unknown)} on words`, { field: unknown });
  }
}

// offsets live on the word's token; words never carry an entity type
function projectField(word: Word, name: FieldName): WordValue {
  switch (name) {
    case START_CHAR: return word.parent?.startChar;
    case END_CHAR: return word.parent?.endChar;
    case TYPE: return undefined;
    default: return word.getField(name);
  }
}

/**
 * A document: raw text plus the sentences annotated over it. Sentences are
 * given as lists of records, one per token or word line.
 */
export class Document {
  private _sentences: Sentence[] = [];
  private _numWords = 0;
  private _ents: Span[] = [];
  private _entitiesState: EntitiesState = 'unbuilt';

  /** Raw text of the whole document, if known. */
  text: string | undefined;

  constructor(sentences: DocumentInput, text?: string) {
    this.text = text;
    this.processSentences(validateDocumentInput(sentences));
    logger.debug({ sentences: this._sentences.length, words: this._numWords }, 'document built');
  }

  private processSentences(input: DocumentInput): void {
    const sentences = input.map(entries => new Sentence(entries));
    for (const sentence of sentences) {
      const first = sentence.tokens[0];
      const last = sentence.tokens[sentence.tokens.length - 1];
      const begin = first?.startChar;
      const end = last?.endChar;
      if (this.text !== undefined && begin !== undefined && end !== undefined) {
        sentence.text = this.text.slice(begin, end);
      }
    }
    this._sentences = sentences;
    this._numWords = sentences.reduce((n, s) => n + s.words.length, 0);
  }

  get sentences(): readonly Sentence[] { return this._sentences; }

  get numWords(): number { return this._numWords; }

  /** Entities from the last `buildEnts` call. */
  get ents(): readonly Span[] { return this._ents; }

  get entities(): readonly Span[] { return this._ents; }

  /**
   * 'stale' once tags or words changed after `buildEnts`; call it again to
   * refresh.
   */
  get entitiesState(): EntitiesState { return this._entitiesState; }

  /**
   * Project fields over every word in document order. One field gives one
   * value per word, several give one tuple per word. Words are those after
   * multi-word expansion. `start_char` and `end_char` come from each word's
   * token.
   */
  get(fields: readonly FieldName[], asSentences: true): Projection[][];
  get(fields: readonly FieldName[], asSentences?: false): Projection[];
  get(fields: readonly FieldName[], asSentences = false): Projection[] | Projection[][] {
    requireFields(fields, isFieldName, 'read');

    const [only] = fields;
    const project = (word: Word): Projection => {
      if (fields.length === 1 && only !== undefined) return projectField(word, only);
      return fields.map(f => projectField(word, f));
    };

    const perSentence = this._sentences.map(s => s.words.map(project));
    return asSentences ? perSentence : perSentence.flat();
  }

  /**
   * Write `contents` back in the order `get` reads them: one entry per word,
   * a scalar for a single field or a tuple for several.
   */
  set(fields: readonly WordField[], contents: readonly Projection[]): void {
    requireFields(fields, isWordField, 'set');
    if (contents.length !== this._numWords) {
      throw new PreconditionError(
        'CONTENT_COUNT',
        `Contents must have the same number of entries as the document has words (${contents.length} != ${this._numWords})`,
        { expected: this._numWords, actual: contents.length }
      );
    }

    const [only] = fields;
    const rows: Array<Array<FieldValue | undefined>> = contents.map((content, i) => {
      if (fields.length === 1 && only !== undefined) {
        if (Array.isArray(content)) {
          throw new PreconditionError('CONTENT_SHAPE', `entry ${i} must be a single value for one field`, { index: i });
        }
        return [content];
      }
      if (!Array.isArray(content) || content.length !== fields.length) {
        throw new PreconditionError('CONTENT_SHAPE', `entry ${i} must hold ${fields.length} values`, { index: i });
      }
      return content;
    });

    const words = [...this.iterWords()];
    // stage on copies so a rejected value leaves the document untouched
    const staged = words.map(w => new Word(w.toDict()));
    staged.forEach((w, i) => {
      const row = rows[i] ?? [];
      fields.forEach((f, j) => w.setField(f, row[j]));
    });
    words.forEach((w, i) => {
      const row = rows[i] ?? [];
      fields.forEach((f, j) => w.setField(f, row[j]));
    });

    if (fields.some(f => DEPENDENCY_FIELDS.has(f))) {
      for (const s of this._sentences) s.markStale();
    }
    if (fields.includes(NER) && this._entitiesState === 'fresh') {
      this._entitiesState = 'stale';
    }
  }

  /**
   * Expand multi-word tokens, consuming one expansion per multi-word token
   * in document order. Each expansion is split on whitespace into the new
   * words. Word ids are renumbered, so dependency heads on the remaining
   * words are cleared.
   */
  setMwtExpansions(expansions: readonly string[]): void {
    const pending = this._sentences.flatMap(s => s.tokens.filter(isMultiWordToken));
    if (pending.length !== expansions.length) {
      throw new PreconditionError(
        'EXPANSION_COUNT',
        `Expected ${pending.length} expansions, got ${expansions.length}`,
        { expected: pending.length, actual: expansions.length }
      );
    }
    const split = expansions.map(splitExpansion);
    const emptyAt = split.findIndex(parts => parts.length === 0);
    if (emptyAt !== -1) {
      throw new PreconditionError('EMPTY_EXPANSION', `Expansion ${emptyAt} has no words`, { index: emptyAt });
    }

    let next = 0;
    for (const sentence of this._sentences) {
      let position = 0;
      for (const token of sentence.tokens) {
        position++;
        if (!isMultiWordToken(token)) {
          for (const word of token.words) {
            word.id = String(position);
            word.head = undefined;
            word.deprel = undefined;
          }
          continue;
        }

        const parts = split[next++] ?? [];
        const end = position + parts.length - 1;
        token.misc = stripMwtMarker(token.misc);
        token.id = `${position}-${end}`;
        // a single word stands for the token when serialized, so it keeps the offsets
        token.words = parts.length === 1
          ? parts.map(text => new Word({ id: String(position), text, misc: token.misc }))
          : parts.map((text, i) => new Word({ id: String(position + i), text }));
        position = end;
      }
    }

    this.processSentences(this.toDict());
    if (this._entitiesState === 'fresh') this._entitiesState = 'stale';
    logger.debug({ expansions: expansions.length, words: this._numWords }, 'multi-word tokens expanded');
  }

  /**
   * Multi-word tokens in document order as `[token text, expanded words]`,
   * or just the token text when `evaluation` is set.
   */
  getMwtExpansions(evaluation: true): string[];
  getMwtExpansions(evaluation?: false): MwtExpansion[];
  getMwtExpansions(evaluation = false): MwtExpansion[] | string[] {
    const pairs: MwtExpansion[] = [];
    for (const token of this.iterTokens()) {
      if (!isMultiWordToken(token)) continue;
      pairs.push([token.text, token.words.map(w => w.text).join(' ')]);
    }
    return evaluation ? pairs.map(([src]) => src) : pairs;
  }

  /**
   * Rebuild the entity list from the words' BIOES tags and return the
   * number of entities found.
   */
  buildEnts(options: BuildEntsOptions = {}): number {
    const typeDrift = options.typeDrift ?? config.entityTypeDrift;
    const mentions = decodeEntities(this._sentences.map(s => s.words), typeDrift);
    this._ents = mentions.map(m => new Span({ words: m.words, type: m.type, doc: this }));
    this._entitiesState = 'fresh';
    logger.debug({ entities: this._ents.length }, 'entities built');
    return this._ents.length;
  }

  *iterWords(): Generator<Word, void, undefined> {
    for (const s of this._sentences) yield* s.words;
  }

  *iterTokens(): Generator<Token, void, undefined> {
    for (const s of this._sentences) yield* s.tokens;
  }

  toDict(): FieldRecord[][] {
    return this._sentences.map(s => s.toDict());
  }

  toJSON(): FieldRecord[][] {
    return this.toDict();
  }

  toString(): string {
    return JSON.stringify(this.toDict(), null, 2);
  }
}
