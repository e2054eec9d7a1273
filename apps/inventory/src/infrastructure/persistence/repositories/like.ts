/**
 * `%term%` pattern for ILIKE with the wildcard characters of `term` escaped.
 */
export function containsPattern(term: string): string {
	return `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}
