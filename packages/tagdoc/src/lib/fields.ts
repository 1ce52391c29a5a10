import { z } from 'zod';
import { PreconditionError } from './errors.js';
import {
  FIELD_NAMES, MULTI_WORD_ID, MWT_MARKER, NULL_SENTINEL,
  type DocumentInput, type FieldName, type FieldRecord, type FieldValue
} from './types.js';

export function isNull(value: unknown): value is null | undefined | typeof NULL_SENTINEL {
  return value === null || value === undefined || value === NULL_SENTINEL;
}

/** Normalize an optional string field: sentinel and absent both become undefined. */
export function optionalString(value: FieldValue | null | undefined): string | undefined {
  return isNull(value) ? undefined : String(value);
}

/** Required fields count an empty string as missing. */
export function isPresent(value: FieldValue | null | undefined): value is FieldValue {
  return value !== null && value !== undefined && value !== '';
}

const KNOWN_FIELDS: ReadonlySet<string> = new Set<string>(FIELD_NAMES);

export function isFieldName(name: string): name is FieldName {
  return KNOWN_FIELDS.has(name);
}

export function parseInteger(value: FieldValue, field: string): number {
  const n = typeof value === 'number' ? value : /^\s*[+-]?\d+\s*$/.test(value) ? Number(value) : NaN;
  if (!Number.isSafeInteger(n)) {
    throw new PreconditionError('INVALID_INTEGER', `${field} must be an integer, got ${JSON.stringify(value)}`, { field, value });
  }
  return n;
}

/**
 * Split a misc string into its `key=value` pairs. Items without `=` are
 * skipped; the value is everything after the first `=`.
 */
export function parseMisc(misc: string): [key: string, value: string][] {
  const pairs: [string, string][] = [];
  for (const item of misc.split('|')) {
    const eq = item.indexOf('=');
    if (eq === -1) continue;
    pairs.push([item.slice(0, eq), item.slice(eq + 1)]);
  }
  return pairs;
}

export function hasMwtMarker(misc: string | null | undefined): boolean {
  if (misc === null || misc === undefined) return false;
  return misc.split('|').includes(MWT_MARKER);
}

/** Remove the multi-word marker; undefined when nothing else was there. */
export function stripMwtMarker(misc: string | undefined): string | undefined {
  if (misc === undefined || misc === MWT_MARKER) return undefined;
  return misc.split('|').filter(item => item !== MWT_MARKER).join('|');
}

export function parseRangeId(id: string): { start: number; end: number } | null {
  const m = MULTI_WORD_ID.exec(id);
  if (!m) return null;
  return { start: Number(m[1]), end: Number(m[2]) };
}

/** True for entries and tokens that are, or will become, multi-word tokens. */
export function isMultiWordEntry(id: string, misc: string | null | undefined): boolean {
  return parseRangeId(id) !== null || hasMwtMarker(misc);
}

/** Copy of `record` holding only set fields, in serialization order. */
export function compactRecord(record: FieldRecord): FieldRecord {
  const out: FieldRecord = {};
  for (const name of FIELD_NAMES) {
    const v = record[name];
    if (v !== null && v !== undefined) out[name] = v;
  }
  return out;
}

const FieldValueSchema = z.union([z.string(), z.number()]).nullish();

export const FieldRecordSchema = z.object({
  id: FieldValueSchema,
  text: FieldValueSchema,
  lemma: FieldValueSchema,
  upos: FieldValueSchema,
  xpos: FieldValueSchema,
  feats: FieldValueSchema,
  head: FieldValueSchema,
  deprel: FieldValueSchema,
  deps: FieldValueSchema,
  misc: FieldValueSchema,
  ner: FieldValueSchema,
  start_char: FieldValueSchema,
  end_char: FieldValueSchema,
  type: FieldValueSchema
});

export const DocumentInputSchema = z.array(z.array(FieldRecordSchema));

export const DocumentFileSchema = z.object({
  text: z.string().optional(),
  sentences: DocumentInputSchema
});

export type DocumentFile = z.infer<typeof DocumentFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

export function validateDocumentInput(input: unknown): DocumentInput {
  const parsed = DocumentInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new PreconditionError('INVALID_INPUT', `Invalid document input: ${formatIssues(parsed.error)}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export function validateDocumentFile(input: unknown): DocumentFile {
  const parsed = DocumentFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new PreconditionError('INVALID_INPUT', `Invalid document file: ${formatIssues(parsed.error)}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}
