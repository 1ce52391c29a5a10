export type PreconditionCode =
  | 'MISSING_FIELD'
  | 'EMPTY_FIELDS'
  | 'UNKNOWN_FIELD'
  | 'CONTENT_COUNT'
  | 'CONTENT_SHAPE'
  | 'EXPANSION_COUNT'
  | 'EMPTY_EXPANSION'
  | 'HEAD_MISMATCH'
  | 'SPAN_INPUT'
  | 'INVALID_INTEGER'
  | 'INVALID_INPUT'
  | 'PARENT_REASSIGNED'
  | 'ENTITY_TYPE_DRIFT';

/**
 * Raised synchronously by the call that violates a precondition. The
 * operation that throws it has not mutated anything.
 */
export class PreconditionError extends Error {
  constructor(
    public readonly code: PreconditionCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export function isPreconditionError(err: unknown, code?: PreconditionCode): err is PreconditionError {
  return err instanceof PreconditionError && (code === undefined || err.code === code);
}
