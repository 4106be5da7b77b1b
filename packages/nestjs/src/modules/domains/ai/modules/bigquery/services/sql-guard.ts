// Checked in order, the first match is reported
export const FORBIDDEN_SQL_KEYWORDS = [
  "DROP",
  "DELETE",
  "INSERT",
  "UPDATE",
  "ALTER",
  "TRUNCATE",
  "CREATE",
  "MERGE",
  "GRANT",
] as const;

export type ForbiddenSqlKeyword = (typeof FORBIDDEN_SQL_KEYWORDS)[number];

/**
 * Plain substring match on the upper-cased text, so a column such as
 * `updated_at` is refused as well.
 */
export function findForbiddenKeyword(
  query: string,
): ForbiddenSqlKeyword | undefined {
  const upper = query.toUpperCase();
  return FORBIDDEN_SQL_KEYWORDS.find((keyword) => upper.includes(keyword));
}
