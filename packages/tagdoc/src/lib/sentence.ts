import { PreconditionError } from './errors.js';
import { hasMwtMarker, isPresent, optionalString, parseInteger, parseRangeId } from './fields.js';
import { logger } from './logger.js';
import { Token } from './token.js';
import { ID, type DependencyState, type FieldRecord, type SentenceInput } from './types.js';
import { Word } from './word.js';

export const ROOT_ID = '0';
export const ROOT_TEXT = 'ROOT';

/** `(governor, relation, dependent)`; the governor of the sentence root is the synthetic ROOT word. */
export type DependencyEdge = readonly [head: Word, deprel: string, dependent: Word];

function hasCompleteDependencies(words: readonly Word[]): boolean {
  return words.every(w => w.head !== undefined && w.deprel !== undefined);
}

// ids must run 1..N; only the last one is checked, the rest is verified
// edge by edge when heads are resolved
function hasCompleteWords(words: readonly Word[]): boolean {
  const last = words[words.length - 1];
  return last !== undefined && Number(last.id) === words.length;
}

function resolveEdges(words: readonly Word[], root: Word): DependencyEdge[] {
  const edges: DependencyEdge[] = [];
  for (const word of words) {
    const { head, deprel } = word;
    if (head === undefined || deprel === undefined) {
      throw new PreconditionError('HEAD_MISMATCH', `word ${word.id} has no head or deprel`, { wordId: word.id });
    }
    if (head === 0) {
      edges.push([root, deprel, word]);
      continue;
    }
    const governor = words[head - 1];
    if (governor === undefined || Number(governor.id) !== head) {
      throw new PreconditionError(
        'HEAD_MISMATCH',
        `head ${head} of word ${word.id} does not match the word at position ${head} (${governor?.id ?? 'none'}); ids must be dense and ordered`,
        { wordId: word.id, head, found: governor?.id }
      );
    }
    edges.push([governor, deprel, word]);
  }
  return edges;
}

/**
 * An ordered list of tokens, the words they expand into, and the
 * dependency graph over those words.
 */
export class Sentence {
  private _tokens: Token[] = [];
  private _words: Word[] = [];
  private _dependencies: DependencyEdge[] = [];
  private _dependencyState: DependencyState = 'incomplete';

  /** Raw text of this sentence, filled in by the owning document when offsets are known. */
  text: string | undefined;

  /** Governor of every word whose head is 0. Not part of `words`. */
  readonly root: Word = new Word({ id: ROOT_ID, text: ROOT_TEXT });

  constructor(entries: SentenceInput) {
    this.rebuild(entries);
  }

  /**
   * Partition records into tokens and words, replacing all previous state.
   * A record whose id is a range (`3-4`) or whose misc carries `MWT=Yes`
   * opens a multi-word token; following records inside the range become
   * its words.
   */
  rebuild(entries: SentenceInput): void {
    const tokens: Token[] = [];
    const words: Word[] = [];
    let rangeEnd = -1;

    entries.forEach((raw, i) => {
      const entry: FieldRecord = isPresent(raw.id) ? raw : { ...raw, id: String(i + 1) };
      const id = String(entry.id);
      const range = parseRangeId(id);

      if (range || hasMwtMarker(optionalString(entry.misc))) {
        if (range) rangeEnd = range.end;
        tokens.push(new Token(entry));
        return;
      }

      const word = new Word(entry);
      words.push(word);
      const open = tokens[tokens.length - 1];
      if (parseInteger(id, ID) <= rangeEnd && open !== undefined) {
        open.addWord(word);
      } else {
        tokens.push(new Token(entry, [word]));
      }
    });

    let edges: DependencyEdge[] = [];
    let state: DependencyState = 'incomplete';
    if (hasCompleteDependencies(words) && hasCompleteWords(words)) {
      edges = resolveEdges(words, this.root);
      state = 'built';
    } else if (words.length > 0) {
      logger.debug({ words: words.length }, 'dependency graph skipped: heads or ids incomplete');
    }

    this._tokens = tokens;
    this._words = words;
    this._dependencies = edges;
    this._dependencyState = state;
  }

  get tokens(): readonly Token[] { return this._tokens; }

  /** Words of every token, in token order. */
  get words(): readonly Word[] { return this._words; }

  /**
   * Edges from the last successful build. Check `dependencyState`: after
   * `markStale()` these may no longer match the words.
   */
  get dependencies(): readonly DependencyEdge[] { return this._dependencies; }

  get dependencyState(): DependencyState { return this._dependencyState; }

  markStale(): void {
    this._dependencyState = 'stale';
  }

  /**
   * Rebuild the dependency graph from the current words. A sentence with a
   * missing head or deprel, or with ids that are not 1..N, gets an empty
   * graph.
   */
  buildDependencies(): readonly DependencyEdge[] {
    if (hasCompleteDependencies(this._words) && hasCompleteWords(this._words)) {
      this._dependencies = resolveEdges(this._words, this.root);
      this._dependencyState = 'built';
    } else {
      this._dependencies = [];
      this._dependencyState = 'incomplete';
    }
    return this._dependencies;
  }

  /** One `(dependent, head id, relation)` line per edge. */
  dependenciesString(): string {
    return this._dependencies
      .map(([head, deprel, word]) => `(${word.text}, ${head.id}, ${deprel})`)
      .join('\n');
  }

  tokensString(): string {
    return this._tokens.map(t => t.prettyPrint()).join('\n');
  }

  wordsString(): string {
    return this._words.map(w => w.prettyPrint()).join('\n');
  }

  toDict(): FieldRecord[] {
    return this._tokens.flatMap(t => t.toDict());
  }

  toJSON(): FieldRecord[] {
    return this.toDict();
  }
}
