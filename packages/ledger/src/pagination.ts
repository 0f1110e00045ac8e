/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f, v } — the cursor field
 * name and the last position seen. Pages are returned as
 * { data, pagination: { cursor, hasMore } }.
 *
 * `iteratePages` turns a page source into a lazy, restartable iterable so
 * callers never receive an unbounded array.
 */

import { LedgerError } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: number; // last seen position
}

/**
 * Encode a cursor from field name and last seen position.
 */
export function encodeCursor(field: string, position: number): string {
  const data: CursorData = { f: field, v: position };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen position.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; position: number } | undefined {
  try {
    const json = Buffer.from(cursor, "base64url").toString("utf-8");
    const data = JSON.parse(json) as Record<string, unknown>;
    if (
      typeof data === "object" &&
      data !== null &&
      typeof data["f"] === "string" &&
      typeof data["v"] === "number" &&
      Number.isInteger(data["v"]) &&
      data["v"] >= 0
    ) {
      return { field: data["f"], position: data["v"] };
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Resolve the position a page starts after. Throws on malformed cursors
 * or cursors minted for a different field.
 */
export function resolveCursor(query: PaginationQuery, fieldName: string): number {
  if (!Number.isInteger(query.limit) || query.limit < 1) {
    throw new LedgerError(
      "INVALID_LIMIT",
      `Page limit must be a positive integer, got ${String(query.limit)}`,
    );
  }

  if (query.cursor === undefined) {
    return 0;
  }

  const decoded = decodeCursor(query.cursor);
  if (decoded === undefined || decoded.field !== fieldName) {
    throw new LedgerError("INVALID_CURSOR", `Invalid ${fieldName} cursor: "${query.cursor}"`);
  }
  return decoded.position;
}

/**
 * Apply cursor-based pagination to an array sorted by position.
 *
 * Items must be sorted by `getPosition` in ascending order.
 * Returns the page items, next cursor, and hasMore flag.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getPosition: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  const after = resolveCursor(query, fieldName);
  const filtered = after > 0
    ? items.filter((item) => getPosition(item) > after)
    : items;

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data[data.length - 1];
  const cursor =
    hasMore && last !== undefined
      ? encodeCursor(fieldName, getPosition(last))
      : null;

  return { data, pagination: { cursor, hasMore } };
}

// =============================================================================
// Lazy iteration
// =============================================================================

/**
 * Walk a paginated source page by page.
 *
 * Nothing is fetched until iteration starts; every new iterator starts
 * again from the first page.
 */
export function iteratePages<T>(
  fetchPage: (query: PaginationQuery) => PaginatedResponse<T>,
  pageSize: number,
): Iterable<T> {
  return {
    *[Symbol.iterator](): Iterator<T> {
      let cursor: string | undefined;
      for (;;) {
        const page = fetchPage({ cursor, limit: pageSize });
        yield* page.data;
        if (!page.pagination.hasMore || page.pagination.cursor === null) {
          return;
        }
        cursor = page.pagination.cursor;
      }
    },
  };
}
