/**
 * Builds a lower-cased `%term%` pattern for `LIKE ... ESCAPE '\'`, escaping
 * the wildcard characters the user typed.
 */
export function likePattern(term: string): string {
  const escaped = term.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`);
  return `%${escaped}%`;
}
