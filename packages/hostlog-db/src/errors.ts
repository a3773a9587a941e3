// SQLSTATE codes for the integrity constraints the schema declares
export const UNIQUE_VIOLATION = '23505';
export const FOREIGN_KEY_VIOLATION = '23503';

/**
 * Integrity constraint violation raised by the in-memory store.
 * Carries the same SQLSTATE a PostgreSQL driver error would.
 */
export class IntegrityError extends Error {
  readonly code: string;
  readonly constraint: string;

  constructor(code: string, constraint: string, message: string) {
    super(message);
    this.name = 'IntegrityError';
    this.code = code;
    this.constraint = constraint;
  }
}

export interface IntegrityViolation {
  code: string;
  message: string;
}

/**
 * Recognizes an integrity constraint violation (SQLSTATE class 23) coming
 * from either the pg driver or the in-memory store.
 */
export function integrityViolation(err: unknown): IntegrityViolation | null {
  if (!(err instanceof Error)) return null;
  const code = 'code' in err ? err.code : undefined;
  if (typeof code !== 'string' || !code.startsWith('23')) return null;
  return { code, message: err.message };
}
