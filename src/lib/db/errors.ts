/**
 * Error base shared by the catalog registries.
 *
 * Each registry exposes its own subclass whose `code` is a string-literal
 * union, so callers can switch on `error.code` after an `instanceof` check.
 */
export abstract class CatalogError<Code extends string = string> extends Error {
  constructor(
    public readonly code: Code,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type ConstraintKind = 'unique' | 'foreignkey';

const CONSTRAINT_CODES: Record<ConstraintKind, string> = {
  unique: 'SQLITE_CONSTRAINT_UNIQUE',
  foreignkey: 'SQLITE_CONSTRAINT_FOREIGNKEY',
};

/**
 * Whether `error` is a SQLite constraint failure of the given kind
 */
export function isConstraintViolation(error: unknown, kind: ConstraintKind): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === CONSTRAINT_CODES[kind]
  );
}

/**
 * Run `fn`, passing catalog errors through and converting anything else
 * (driver failures, constraint violations) with `translate`.
 */
export function translateStorageErrors<T>(fn: () => T, translate: (error: unknown) => Error): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof CatalogError) throw error;
    throw translate(error);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
