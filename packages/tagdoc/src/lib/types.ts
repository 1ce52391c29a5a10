export const ID = 'id';
export const TEXT = 'text';
export const LEMMA = 'lemma';
export const UPOS = 'upos';
export const XPOS = 'xpos';
export const FEATS = 'feats';
export const HEAD = 'head';
export const DEPREL = 'deprel';
export const DEPS = 'deps';
export const MISC = 'misc';
export const NER = 'ner';
export const START_CHAR = 'start_char';
export const END_CHAR = 'end_char';
export const TYPE = 'type';

/**
 * Recognized field names, in the order records are serialized.
 */
export const FIELD_NAMES = [
  ID, TEXT, LEMMA, UPOS, XPOS, FEATS, HEAD, DEPREL, DEPS, MISC, NER, START_CHAR, END_CHAR, TYPE
] as const;

export type FieldName = typeof FIELD_NAMES[number];

/**
 * Fields a Word carries. `get`/`set` on a Document project over these.
 */
export const WORD_FIELDS = [ID, TEXT, LEMMA, UPOS, XPOS, FEATS, HEAD, DEPREL, DEPS, MISC, NER] as const;

export type WordField = typeof WORD_FIELDS[number];

export const TOKEN_FIELDS = [ID, TEXT, MISC] as const;

export type TokenField = typeof TOKEN_FIELDS[number];

export type FieldValue = string | number;

/**
 * Uniform input/output shape of every unit. A missing key, `null`,
 * `undefined` and the null sentinel all mean "unset".
 */
export type FieldRecord = { [K in FieldName]?: FieldValue | null };

/** Value read back from a Word field; `undefined` is unset. */
export type WordValue = FieldValue | undefined;

/** One `get` entry: a scalar for a single field, a tuple for several. */
export type Projection = WordValue | WordValue[];

export type SentenceInput = FieldRecord[];

export type DocumentInput = SentenceInput[];

export const NULL_SENTINEL = '_';

export const MWT_MARKER = 'MWT=Yes';

export const MULTI_WORD_ID = /^(\d+)-(\d+)$/;

export type EntityTypeDrift = 'tolerate' | 'reject';

export interface BuildEntsOptions {
  /**
   * What to do when an I- or E- tag continues an entity opened with a
   * different type. 'tolerate' lets the later tag's type win.
   */
  typeDrift?: EntityTypeDrift;
}

export type DependencyState = 'built' | 'incomplete' | 'stale';

export type EntitiesState = 'unbuilt' | 'fresh' | 'stale';

/** `[source text, space-joined expansion]` for one multi-word token. */
export type MwtExpansion = [source: string, expansion: string];
