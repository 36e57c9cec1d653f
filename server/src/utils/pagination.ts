export type Pagination = {
  page: number;
  limit: number;
  skip: number;
};

function parseNonNegativeInt(raw: unknown): number | null {
  if (typeof raw !== "string" || !raw.trim()) return null;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) return null;
  return n;
}

/**
 * Reads `page`/`limit`, or `skip`/`limit` when the caller pages by offset.
 * An explicit `skip` wins over `page`.
 */
export function getPagination(
  query: Record<string, unknown>,
  opts?: {
    defaultLimit?: number;
    maxLimit?: number;
  }
): Pagination {
  const defaultLimit = opts?.defaultLimit ?? 100;
  const maxLimit = opts?.maxLimit ?? 500;

  const requestedLimit = parseNonNegativeInt(query.limit) || defaultLimit;
  const limit = Math.max(1, Math.min(maxLimit, requestedLimit));

  const skipRaw = parseNonNegativeInt(query.skip);
  if (skipRaw !== null) {
    return { page: Math.floor(skipRaw / limit) + 1, limit, skip: skipRaw };
  }

  const page = parseNonNegativeInt(query.page) || 1;
  return { page, limit, skip: (page - 1) * limit };
}
