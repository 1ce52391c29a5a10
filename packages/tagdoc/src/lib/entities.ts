import { PreconditionError } from './errors.js';
import { logger } from './logger.js';
import type { EntityTypeDrift } from './types.js';
import type { Word } from './word.js';

export interface EntityMention {
  type: string;
  words: Word[];
}

export type BioesPrefix = 'B' | 'I' | 'E' | 'S';

export type ParsedTag =
  | { kind: 'outside' }
  | { kind: 'entity'; prefix: BioesPrefix; type: string }
  | { kind: 'unknown'; tag: string };

export function parseTag(tag: string | undefined): ParsedTag {
  if (tag === undefined || tag === 'O') return { kind: 'outside' };
  const m = /^([BIES])-(.*)$/s.exec(tag);
  if (!m) return { kind: 'unknown', tag };
  const prefix = m[1];
  if (prefix !== 'B' && prefix !== 'I' && prefix !== 'E' && prefix !== 'S') return { kind: 'unknown', tag };
  return { kind: 'entity', prefix, type: m[2] ?? '' };
}

/**
 * Decode BIOES tags into entity mentions, one sentence's words at a time.
 * Mentions never cross a sentence: whatever is open at the end of a
 * sentence is emitted there. Tags with an unrecognized prefix are skipped
 * and leave the open mention untouched.
 */
export function decodeEntities(
  sentences: Iterable<readonly Word[]>,
  typeDrift: EntityTypeDrift = 'tolerate'
): EntityMention[] {
  const mentions: EntityMention[] = [];
  let current: Word[] = [];
  let currentType = '';

  const flush = () => {
    if (current.length > 0) mentions.push({ type: currentType, words: current });
    current = [];
  };

  const continueWith = (word: Word, type: string) => {
    if (current.length > 0 && type !== currentType) {
      if (typeDrift === 'reject') {
        throw new PreconditionError(
          'ENTITY_TYPE_DRIFT',
          `tag ${word.ner} on word ${word.id} continues a ${currentType} entity`,
          { wordId: word.id, tag: word.ner, openType: currentType }
        );
      }
      logger.debug({ wordId: word.id, from: currentType, to: type }, 'entity type changed mid-entity');
    }
    current.push(word);
    currentType = type;
  };

  for (const words of sentences) {
    for (const word of words) {
      const tag = parseTag(word.ner);
      if (tag.kind === 'outside') {
        flush();
        continue;
      }
      if (tag.kind === 'unknown') continue;

      switch (tag.prefix) {
        case 'B':
          flush();
          current = [word];
          currentType = tag.type;
          break;
        case 'I':
          continueWith(word, tag.type);
          break;
        case 'E':
          continueWith(word, tag.type);
          flush();
          break;
        case 'S':
          flush();
          current = [word];
          currentType = tag.type;
          flush();
          break;
      }
    }
    flush();
  }

  return mentions;
}
