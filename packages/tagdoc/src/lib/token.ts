import { PreconditionError } from './errors.js';
import { isPresent, optionalString, parseInteger, parseMisc } from './fields.js';
import { END_CHAR, ID, START_CHAR, TEXT, TOKEN_FIELDS, type FieldRecord, type FieldValue } from './types.js';
import type { Word } from './word.js';

type MiscSetter = (token: Token, value: string) => void;

function requireField(name: string, value: FieldValue | null | undefined): string {
  if (!isPresent(value)) {
    throw new PreconditionError('MISSING_FIELD', `${name} is required for a token`, { field: name });
  }
  return String(value);
}

/**
 * A contiguous span of raw text. In languages with contractions one token
 * may expand into several syntactic words (a multi-word token).
 */
export class Token {
  private _id: string;
  private _text: string;
  private _misc: string | undefined;
  private _words: Word[] = [];
  private _startChar: number | undefined;
  private _endChar: number | undefined;

  /**
   * Misc keys that populate token attributes. Keys not listed here stay in
   * the raw misc string only.
   */
  private static readonly MISC_SETTERS: ReadonlyMap<string, MiscSetter> = new Map<string, MiscSetter>([
    [START_CHAR, (token, value) => { token._startChar = parseInteger(value, START_CHAR); }],
    [END_CHAR, (token, value) => { token._endChar = parseInteger(value, END_CHAR); }]
  ]);

  constructor(entry: FieldRecord, words?: Word[]) {
    this._id = requireField(ID, entry.id);
    this._text = requireField(TEXT, entry.text);
    this._misc = optionalString(entry.misc);
    if (this._misc !== undefined) this.initFromMisc(this._misc);

    if (words) this.words = words;
  }

  private initFromMisc(misc: string): void {
    for (const [key, value] of parseMisc(misc)) {
      Token.MISC_SETTERS.get(key)?.(this, value);
    }
  }

  /** Either a single integer id or a 'start-end' range. */
  get id(): string { return this._id; }
  set id(value: FieldValue) { this._id = requireField(ID, value); }

  get text(): string { return this._text; }
  set text(value: FieldValue) { this._text = requireField(TEXT, value); }

  /**
   * Raw misc string. Offsets are only parsed from it at construction, so
   * replacing it leaves startChar/endChar as they were.
   */
  get misc(): string | undefined { return this._misc; }
  set misc(value: FieldValue | null | undefined) { this._misc = optionalString(value); }

  /** Syntactic words underlying this token. Assigning links each word back to this token. */
  get words(): readonly Word[] { return this._words; }
  set words(value: readonly Word[]) {
    const foreign = value.find(w => w.parent !== undefined && w.parent !== this);
    // raises before any word in the list is linked
    if (foreign) foreign.attachTo(this);
    for (const w of value) w.attachTo(this);
    this._words = [...value];
  }

  addWord(word: Word): void {
    word.attachTo(this);
    this._words.push(word);
  }

  get isMultiWord(): boolean {
    return this._words.length > 1;
  }

  /** Start character offset in the raw document text */
  get startChar(): number | undefined { return this._startChar; }

  /** End character offset (exclusive) in the raw document text */
  get endChar(): number | undefined { return this._endChar; }

  /**
   * Records for this token: a token line first when the token does not
   * map to exactly one word, then one record per word.
   */
  toDict(): FieldRecord[] {
    const out: FieldRecord[] = [];
    if (this._words.length !== 1) {
      const record: FieldRecord = {};
      for (const name of TOKEN_FIELDS) {
        const v = name === ID ? this._id : name === TEXT ? this._text : this._misc;
        if (v !== undefined) record[name] = v;
      }
      out.push(record);
    }
    for (const w of this._words) out.push(w.toDict());
    return out;
  }

  toJSON(): FieldRecord[] {
    return this.toDict();
  }

  prettyPrint(): string {
    return `<Token id=${this._id};words=[${this._words.map(w => w.prettyPrint()).join(', ')}]>`;
  }
}
