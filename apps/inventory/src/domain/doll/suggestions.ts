/**
 * Name suggestions: names starting with the query first, then names
 * containing it elsewhere, each group alphabetical ignoring case.
 */

/** Matches fetched from storage before ranking */
export const SUGGESTION_CANDIDATES = 50;

function compareNames(a: string, b: string): number {
	const left = a.toLowerCase();
	const right = b.toLowerCase();
	if (left < right) return -1;
	if (left > right) return 1;
	return 0;
}

export function rankSuggestions<T extends { readonly name: string }>(
	candidates: readonly T[],
	query: string,
	limit: number,
): T[] {
	const needle = query.toLowerCase();
	const startsWith: T[] = [];
	const contains: T[] = [];

	for (const candidate of candidates) {
		if (candidate.name.toLowerCase().startsWith(needle)) {
			startsWith.push(candidate);
		} else {
			contains.push(candidate);
		}
	}

	const byName = (a: T, b: T) => compareNames(a.name, b.name);
	return [...startsWith.sort(byName), ...contains.sort(byName)].slice(0, limit);
}
