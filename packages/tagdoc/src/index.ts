// Curated public API
export type {
  FieldName, FieldRecord, FieldValue, WordField, TokenField, WordValue, Projection,
  SentenceInput, DocumentInput, BuildEntsOptions, EntityTypeDrift, DependencyState,
  EntitiesState, MwtExpansion
} from './lib/types.js';
export { FIELD_NAMES, WORD_FIELDS, TOKEN_FIELDS, NULL_SENTINEL, MWT_MARKER, MULTI_WORD_ID } from './lib/types.js';
export { Document } from './lib/document.js';
export { Sentence, ROOT_ID, ROOT_TEXT } from './lib/sentence.js';
export type { DependencyEdge } from './lib/sentence.js';
export { Token } from './lib/token.js';
export { Word, isWordField } from './lib/word.js';
export { Span } from './lib/span.js';
export type { SpanInit } from './lib/span.js';
export { decodeEntities, parseTag } from './lib/entities.js';
export type { EntityMention, BioesPrefix, ParsedTag } from './lib/entities.js';
export {
  isNull, isFieldName, parseMisc, hasMwtMarker, stripMwtMarker, parseRangeId, isMultiWordEntry,
  FieldRecordSchema, DocumentInputSchema, DocumentFileSchema, validateDocumentInput, validateDocumentFile
} from './lib/fields.js';
export type { DocumentFile } from './lib/fields.js';
export { PreconditionError, isPreconditionError } from './lib/errors.js';
export type { PreconditionCode } from './lib/errors.js';
export { config, defaultConfig, resolveConfig, LOG_LEVELS } from './lib/config.js';
export type { TagdocConfig, LogLevel } from './lib/config.js';
export { createLogger, logger } from './lib/logger.js';
export type { Logger, LoggerConfig } from './lib/logger.js';
export { loadDocumentFile, renderReport } from './lib/report.js';
export type { ReportOptions } from './lib/report.js';
