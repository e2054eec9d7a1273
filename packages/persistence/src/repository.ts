/**
 * Repository Types
 *
 * Read-side repository contracts. Writes go through aggregate handlers inside
 * the unit of work's transaction; repositories only query.
 */

/**
 * Base read repository.
 *
 * @typeParam T - The entity type
 */
export interface ReadRepository<T> {
	/**
	 * Find an entity by its typed ID.
	 */
	findById(id: string): Promise<T | undefined>;
}

/**
 * Offset pagination request.
 */
export interface PageRequest {
	readonly limit: number;
	readonly offset: number;
}

/**
 * Paginated result with metadata.
 */
export interface PagedResult<T> {
	readonly items: T[];
	readonly total: number;
	readonly limit: number;
	readonly offset: number;
}

export function createPagedResult<T>(items: T[], total: number, page: PageRequest): PagedResult<T> {
	return {
		items,
		total,
		limit: page.limit,
		offset: page.offset,
	};
}
