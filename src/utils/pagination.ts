/** limit/offset with defaults, clamped to `maxLimit`. */
export function parsePagination(
  query: { limit?: number; offset?: number },
  opts: { defaultLimit?: number; maxLimit?: number } = {}
) {
  const { defaultLimit = 50, maxLimit = 200 } = opts;
  const limit = query.limit ?? defaultLimit;
  const offset = query.offset ?? 0;
  return { limit: Math.min(limit, maxLimit), offset };
}
