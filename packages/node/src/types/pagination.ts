/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { f, v }, where `v` is the
 * last position returned. Positions are integers (global positions or
 * stream versions), so pages are ordered numerically.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

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

export interface DecodedCursor {
  readonly field: string;
  readonly position: number;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: number; // last seen position
}

export function encodeCursor(field: string, position: number): string {
  const data: CursorData = { f: field, v: position };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen position.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(cursor: string): DecodedCursor | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || !("f" in data) || !("v" in data)) {
    return undefined;
  }
  const { f, v } = data;
  if (typeof f !== "string" || typeof v !== "number" || !Number.isSafeInteger(v)) {
    return undefined;
  }
  return { field: f, position: v };
}

/**
 * Apply cursor-based pagination to an array sorted by position.
 *
 * A cursor minted for another field is ignored, so a stream cursor
 * cannot skip into the global listing.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getPosition: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      filtered = filtered.filter((item) => getPosition(item) > decoded.position);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data[data.length - 1];
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getPosition(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
