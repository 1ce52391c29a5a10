import type { Document } from './document.js';
import { PreconditionError } from './errors.js';
import { compactRecord, isNull, optionalString, parseInteger } from './fields.js';
import { END_CHAR, START_CHAR, TEXT, TYPE, type FieldRecord } from './types.js';
import type { Word } from './word.js';

export interface SpanInit {
  /** Explicit text/type/offsets, trusted as given */
  entry?: FieldRecord;
  words?: readonly Word[];
  type?: string;
  doc: Document | undefined;
}

/**
 * A typed run of contiguous words, e.g. an entity mention. The words are
 * borrowed from the document; the span never owns them.
 */
export class Span {
  readonly doc: Document;
  readonly words: readonly Word[];
  text: string | undefined;
  type: string | undefined;
  startChar: number | undefined;
  endChar: number | undefined;

  constructor({ entry, words, type, doc }: SpanInit) {
    if (entry === undefined && (words === undefined || type === undefined)) {
      throw new PreconditionError('SPAN_INPUT', 'Either a span entry or a word list with a type is required to construct a span');
    }
    if (doc === undefined) {
      throw new PreconditionError('SPAN_INPUT', 'A parent document is required to construct a span');
    }
    this.doc = doc;
    this.words = [];

    if (entry !== undefined) {
      this.text = optionalString(entry[TEXT]);
      this.type = optionalString(entry[TYPE]);
      const start = entry[START_CHAR];
      const end = entry[END_CHAR];
      this.startChar = isNull(start) ? undefined : parseInteger(start, START_CHAR);
      this.endChar = isNull(end) ? undefined : parseInteger(end, END_CHAR);
    }

    if (words !== undefined && type !== undefined) {
      const first = words[0];
      const last = words[words.length - 1];
      if (first === undefined || last === undefined) {
        throw new PreconditionError('SPAN_INPUT', 'Words of a span cannot be an empty list');
      }
      this.words = [...words];
      this.type = type;
      // offsets come from the tokens that own the boundary words
      this.startChar = first.parent?.startChar;
      this.endChar = last.parent?.endChar;
      this.text = doc.text !== undefined && this.startChar !== undefined && this.endChar !== undefined
        ? doc.text.slice(this.startChar, this.endChar)
        : undefined;
    }
  }

  toDict(): FieldRecord {
    return compactRecord({
      [TEXT]: this.text,
      [TYPE]: this.type,
      [START_CHAR]: this.startChar,
      [END_CHAR]: this.endChar
    });
  }

  toJSON(): FieldRecord {
    return this.toDict();
  }
}
