import type { Id, QueryParams } from '../../types/api.js';

/** Encodes a value for use as a single path segment. */
export function seg(value: Id): string {
  return encodeURIComponent(String(value));
}

/**
 * Merges an optional caller filter over the fixed query parameters of an
 * accessor. Filter keys win, as the API documents filters per resource.
 */
export function withFilter(fixed: QueryParams, filter?: QueryParams): QueryParams {
  return filter ? { ...fixed, ...filter } : fixed;
}
