import { readFile } from 'fs/promises';
import { config } from './config.js';
import { Document } from './document.js';
import { decodeEntities } from './entities.js';
import { validateDocumentFile } from './fields.js';
import { PreconditionError } from './errors.js';
import { Span } from './span.js';
import type { EntityTypeDrift } from './types.js';

export interface ReportOptions {
  entities?: boolean;
  dependencies?: boolean;
  tokens?: boolean;
  typeDrift?: EntityTypeDrift;
}

/**
 * Read a JSON file of the form `{ text?, sentences: FieldRecord[][] }` and
 * build a Document from it.
 */
export async function loadDocumentFile(file: string): Promise<Document> {
  const raw = await readFile(file, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new PreconditionError('INVALID_INPUT', `${file} is not valid JSON: ${reason}`, { file });
  }
  const { text, sentences } = validateDocumentFile(json);
  return new Document(sentences, text);
}

/** Renders the report without touching the document's own entity list. */
export function renderReport(doc: Document, options: ReportOptions = {}): string {
  const tokens = [...doc.iterTokens()];
  const lines = [
    `sentences\t${doc.sentences.length}`,
    `tokens\t${tokens.length}`,
    `words\t${doc.numWords}`,
    `multi-word tokens\t${doc.getMwtExpansions(true).length}`
  ];

  if (options.entities) {
    const mentions = decodeEntities(doc.sentences.map(s => s.words), options.typeDrift ?? config.entityTypeDrift);
    const ents = mentions.map(m => new Span({ words: m.words, type: m.type, doc }));
    lines.push(`entities\t${ents.length}`);
    for (const ent of ents) {
      const text = ent.text ?? ent.words.map(w => w.text).join(' ');
      lines.push(`  ${ent.type ?? '?'}\t${text}\t${ent.startChar ?? '?'}-${ent.endChar ?? '?'}`);
    }
  }

  if (options.tokens || options.dependencies) {
    doc.sentences.forEach((sentence, i) => {
      lines.push(`# sentence ${i + 1}${sentence.text !== undefined ? `: ${sentence.text}` : ''}`);
      if (options.tokens) lines.push(sentence.tokensString());
      if (options.dependencies) {
        lines.push(sentence.dependencyState === 'built' ? sentence.dependenciesString() : '(no dependency graph)');
      }
    });
  }

  return lines.join('\n');
}
