// =============================================================================
// Typed Error System for the Resource Catalog
// Base class + per-kind subclasses with error codes and HTTP status mapping
// =============================================================================

export class CatalogError extends Error {
  public code: string;
  public statusCode: number;
  public cause?: unknown;

  constructor(code: string, message: string, statusCode: number = 500, cause?: unknown) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.cause = cause;
    this.name = 'CatalogError';
  }

  toJSON(): { error: string; code: string; status: number } {
    return { error: this.message, code: this.code, status: this.statusCode };
  }
}

// --- Lookup / uniqueness (raised by use cases before touching the store) ---

export class NotFoundError extends CatalogError {
  constructor(
    public readonly entity: string,
    public readonly id: string | number
  ) {
    super('NOT_FOUND', `Entity not found: ${entity} with id ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends CatalogError {
  constructor(
    public readonly entity: string,
    public readonly field: string,
    public readonly value: string
  ) {
    super('ALREADY_EXISTS', `Entity already exists: ${entity} with ${field} = ${value}`, 409);
    this.name = 'AlreadyExistsError';
  }
}

// --- Input and business rules ---

export class InvalidInputError extends CatalogError {
  constructor(message: string) {
    super('INVALID_INPUT', `Invalid input: ${message}`, 400);
    this.name = 'InvalidInputError';
  }
}

export class BusinessRuleViolationError extends CatalogError {
  constructor(message: string) {
    super('BUSINESS_RULE_VIOLATION', `Business rule violation: ${message}`, 422);
    this.name = 'BusinessRuleViolationError';
  }
}

// --- Infrastructure (details stay server-side) ---

export class DatabaseError extends CatalogError {
  constructor(message: string, cause?: unknown) {
    super('DATABASE_ERROR', `Database error: ${message}`, 500, cause);
    this.name = 'DatabaseError';
  }

  toJSON(): { error: string; code: string; status: number } {
    return { error: 'Database error occurred', code: this.code, status: this.statusCode };
  }
}

export class InternalError extends CatalogError {
  constructor(message: string, cause?: unknown) {
    super('INTERNAL_ERROR', `Internal error: ${message}`, 500, cause);
    this.name = 'InternalError';
  }

  toJSON(): { error: string; code: string; status: number } {
    return { error: 'Internal server error', code: this.code, status: this.statusCode };
  }
}

// --- Utility: check if an error is a CatalogError ---

export function isCatalogError(err: unknown): err is CatalogError {
  return err instanceof CatalogError;
}

// --- Utility: wrap unknown errors as InternalError ---

export function wrapError(err: unknown, fallbackMessage: string): CatalogError {
  if (err instanceof CatalogError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new InternalError(`${fallbackMessage}: ${message}`, err);
}

// --- Utility: run a store operation, reporting driver failures as DatabaseError ---

export async function withDatabaseErrors<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof CatalogError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new DatabaseError(`Failed to ${operation}: ${message}`, err);
  }
}
