import { PreconditionError } from './errors.js';
import { isNull, isPresent, optionalString, parseInteger, parseMisc } from './fields.js';
import type { Token } from './token.js';
import {
  DEPREL, DEPS, FEATS, HEAD, ID, LEMMA, NER, NULL_SENTINEL, TEXT, UPOS, WORD_FIELDS, XPOS,
  type FieldRecord, type FieldValue, type WordField, type WordValue
} from './types.js';

type Assignable = FieldValue | null | undefined;

interface FieldAccessor {
  get(word: Word): WordValue;
  set(word: Word, value: Assignable): void;
}

// Named access to every Word field. Document.get/set and serialization go
// through this table so they agree on which fields exist.
const WORD_ACCESSORS: Record<WordField, FieldAccessor> = {
  id: { get: w => w.id, set: (w, v) => { w.id = v; } },
  text: { get: w => w.text, set: (w, v) => { w.text = v; } },
  lemma: { get: w => w.lemma, set: (w, v) => { w.lemma = v; } },
  upos: { get: w => w.upos, set: (w, v) => { w.upos = v; } },
  xpos: { get: w => w.xpos, set: (w, v) => { w.xpos = v; } },
  feats: { get: w => w.feats, set: (w, v) => { w.feats = v; } },
  head: { get: w => w.head, set: (w, v) => { w.head = v; } },
  deprel: { get: w => w.deprel, set: (w, v) => { w.deprel = v; } },
  deps: { get: w => w.deps, set: (w, v) => { w.deps = v; } },
  misc: { get: w => w.misc, set: (w, v) => { w.misc = v; } },
  ner: { get: w => w.ner, set: (w, v) => { w.ner = v; } }
};

type MiscSetter = (word: Word, value: string) => void;

// Annotation fields a word may also carry as misc pairs. Id, text and misc
// itself never come from misc.
const MISC_FIELDS: readonly WordField[] = [LEMMA, UPOS, XPOS, FEATS, HEAD, DEPREL, DEPS, NER];

function fillFromMisc(name: WordField): MiscSetter {
  return (word, value) => {
    if (WORD_ACCESSORS[name].get(word) === undefined) WORD_ACCESSORS[name].set(word, value);
  };
}

const PRETTY_FIELDS: WordField[] = [ID, TEXT, LEMMA, UPOS, XPOS, FEATS, HEAD, DEPREL];

function requireField(name: string, value: Assignable, entry?: FieldRecord): string {
  if (!isPresent(value)) {
    const where = entry ? ` ${JSON.stringify(entry)}` : '';
    throw new PreconditionError('MISSING_FIELD', `${name} is required for a word${where}`, { field: name });
  }
  return String(value);
}

/**
 * The smallest annotated syntactic unit. Optional fields read back as
 * `undefined` when unset; assigning `null`, `undefined` or `_` unsets them.
 */
export class Word {
  private _id: string;
  private _text: string;
  private _lemma: string | undefined;
  private _upos: string | undefined;
  private _xpos: string | undefined;
  private _feats: string | undefined;
  private _head: number | undefined;
  private _deprel: string | undefined;
  private _deps: string | undefined;
  private _misc: string | undefined;
  private _ner: string | undefined;
  private _parent: Token | undefined;

  private static readonly MISC_SETTERS: ReadonlyMap<string, MiscSetter> = new Map<string, MiscSetter>(
    MISC_FIELDS.map((name): [string, MiscSetter] => [name, fillFromMisc(name)])
  );

  constructor(entry: FieldRecord) {
    this._id = requireField(ID, entry.id, entry);
    this._text = requireField(TEXT, entry.text, entry);
    this.lemma = entry.lemma;
    this.upos = entry.upos;
    this.xpos = entry.xpos;
    this.feats = entry.feats;
    this.head = entry.head;
    this.deprel = entry.deprel;
    this.deps = entry.deps;
    this.misc = entry.misc;
    this.ner = entry.ner;
    if (this._misc !== undefined) this.initFromMisc(this._misc);
  }

  // misc pairs only fill fields the entry left unset
  private initFromMisc(misc: string): void {
    for (const [key, value] of parseMisc(misc)) {
      Word.MISC_SETTERS.get(key)?.(this, value);
    }
  }

  get id(): string { return this._id; }
  set id(value: Assignable) { this._id = requireField(ID, value); }

  /** Surface form, e.g. 'The' */
  get text(): string { return this._text; }
  set text(value: Assignable) { this._text = requireField(TEXT, value); }

  get lemma(): string | undefined { return this._lemma; }
  set lemma(value: Assignable) {
    // a placeholder word keeps whatever lemma it was given, sentinel included
    if (this._text === NULL_SENTINEL) {
      this._lemma = value === null || value === undefined ? undefined : String(value);
    } else {
      this._lemma = optionalString(value);
    }
  }

  /** Universal part-of-speech, e.g. 'NOUN' */
  get upos(): string | undefined { return this._upos; }
  set upos(value: Assignable) { this._upos = optionalString(value); }

  get pos(): string | undefined { return this._upos; }
  set pos(value: Assignable) { this._upos = optionalString(value); }

  /** Treebank-specific part-of-speech, e.g. 'NNP' */
  get xpos(): string | undefined { return this._xpos; }
  set xpos(value: Assignable) { this._xpos = optionalString(value); }

  /** Morphological features, e.g. 'Gender=Fem' */
  get feats(): string | undefined { return this._feats; }
  set feats(value: Assignable) { this._feats = optionalString(value); }

  /** Id of the governor; 0 is the root. */
  get head(): number | undefined { return this._head; }
  set head(value: Assignable) {
    this._head = isNull(value) ? undefined : parseInteger(value, HEAD);
  }

  get deprel(): string | undefined { return this._deprel; }
  set deprel(value: Assignable) { this._deprel = optionalString(value); }

  get deps(): string | undefined { return this._deps; }
  set deps(value: Assignable) { this._deps = optionalString(value); }

  get misc(): string | undefined { return this._misc; }
  set misc(value: Assignable) { this._misc = optionalString(value); }

  /** NER tag, e.g. 'B-ORG' */
  get ner(): string | undefined { return this._ner; }
  set ner(value: Assignable) { this._ner = optionalString(value); }

  /**
   * The token this word belongs to. For a multi-word token several words
   * share one parent.
   */
  get parent(): Token | undefined { return this._parent; }

  /**
   * Link this word to its token. Called by Token when words are assigned;
   * a word belongs to at most one token.
   */
  attachTo(token: Token): void {
    if (this._parent !== undefined && this._parent !== token) {
      throw new PreconditionError('PARENT_REASSIGNED', `word ${this._id} (${this._text}) already belongs to token ${this._parent.id}`);
    }
    this._parent = token;
  }

  getField(name: WordField): WordValue {
    return WORD_ACCESSORS[name].get(this);
  }

  setField(name: WordField, value: Assignable): void {
    WORD_ACCESSORS[name].set(this, value);
  }

  toDict(): FieldRecord {
    const out: FieldRecord = {};
    for (const name of WORD_FIELDS) {
      const v = this.getField(name);
      if (v !== undefined) out[name] = v;
    }
    return out;
  }

  toJSON(): FieldRecord {
    return this.toDict();
  }

  prettyPrint(): string {
    const parts = PRETTY_FIELDS
      .map(name => [name, this.getField(name)] as const)
      .filter(([, v]) => v !== undefined)
      .map(([name, v]) => `${name}=${v}`);
    return `<Word ${parts.join(';')}>`;
  }
}

export function isWordField(name: string): name is WordField {
  return Object.prototype.hasOwnProperty.call(WORD_ACCESSORS, name);
}
