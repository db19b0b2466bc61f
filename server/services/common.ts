import { InvalidInputError } from '../lib/errors';
import { Pagination } from '../types/query';

export interface PagedResult<T> {
  records: T[];
  pagination: Pagination;
}

/** Trimmed value, or InvalidInputError when nothing is left. */
export function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) throw new InvalidInputError(`${field} must not be empty`);
  return trimmed;
}
