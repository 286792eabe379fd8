import fuzzysort from 'fuzzysort';

/**
 * Close matches for a misspelt identifier among the known table/column names.
 * A qualified reference such as `e.departmnt` is matched on its last segment.
 */
export function suggestNames(reference: string, known: Iterable<string>, limit = 3): string[] {
  const needle = reference.split('.').pop()?.replace(/[`"[\]]/g, '') ?? '';
  if (!needle) return [];
  const corpus = Array.from(new Set(known));
  return fuzzysort.go(needle, corpus, { limit }).map((r) => r.target);
}
