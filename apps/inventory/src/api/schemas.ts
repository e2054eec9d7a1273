/**
 * Request schemas shared by the route modules.
 */

import { Type } from '@dollhouse/http';

export const IdParams = Type.Object({
	id: Type.String({ minLength: 1 }),
});

/**
 * `limit` and `offset` with per-route bounds.
 */
export function pageQuery(defaultLimit: number, maxLimit: number) {
	return {
		limit: Type.Integer({ minimum: 1, maximum: maxLimit, default: defaultLimit }),
		offset: Type.Integer({ minimum: 0, default: 0 }),
	};
}
