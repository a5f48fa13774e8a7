/**
 * SQLite error classification
 */

/**
 * Message prefix of SQLite UNIQUE violations, followed by the
 * table.column list: "UNIQUE constraint failed: glossary_terms.term_key, ..."
 */
export const UNIQUE_CONSTRAINT_PREFIX = "UNIQUE constraint failed:";

/**
 * True for a UNIQUE violation, optionally only one on `table`
 *
 * @example
 * isUniqueConstraintError(err, "glossary_terms")
 */
export function isUniqueConstraintError(err: unknown, table?: string): boolean {
  if (!(err instanceof Error) || !err.message.startsWith(UNIQUE_CONSTRAINT_PREFIX)) {
    return false;
  }
  if (table === undefined) {
    return true;
  }
  return err.message
    .slice(UNIQUE_CONSTRAINT_PREFIX.length)
    .split(",")
    .some((column) => column.trim().startsWith(`${table}.`));
}
