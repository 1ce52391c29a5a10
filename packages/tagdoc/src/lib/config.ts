import { z } from 'zod';
import type { EntityTypeDrift } from './types.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface TagdocConfig {
  logLevel: LogLevel;
  /** Default policy for `Document.buildEnts` when a tag changes an open entity's type. */
  entityTypeDrift: EntityTypeDrift;
}

export const defaultConfig: TagdocConfig = {
  logLevel: 'warn',
  entityTypeDrift: 'tolerate'
};

const EnvSchema = z.object({
  TAGDOC_LOG_LEVEL: z.enum(LOG_LEVELS).catch(defaultConfig.logLevel),
  TAGDOC_ENTITY_TYPE_DRIFT: z.enum(['tolerate', 'reject']).catch(defaultConfig.entityTypeDrift)
});

/**
 * Resolve configuration from environment variables. A missing or
 * unrecognized value resolves to its default.
 */
export function resolveConfig(env: Record<string, string | undefined> = process.env): TagdocConfig {
  const parsed = EnvSchema.parse({
    TAGDOC_LOG_LEVEL: env.TAGDOC_LOG_LEVEL?.trim().toLowerCase(),
    TAGDOC_ENTITY_TYPE_DRIFT: env.TAGDOC_ENTITY_TYPE_DRIFT?.trim().toLowerCase()
  });

  return {
    logLevel: parsed.TAGDOC_LOG_LEVEL,
    entityTypeDrift: parsed.TAGDOC_ENTITY_TYPE_DRIFT
  };
}

export const config: TagdocConfig = resolveConfig();
