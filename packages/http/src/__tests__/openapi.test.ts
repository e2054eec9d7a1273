import { describe, it, expect } from 'vitest';
import {
	CommonSchemas,
	paginatedResponse,
	listResponse,
	OpenAPIResponses,
	combineResponses,
	validateBody,
	safeValidate,
	Type,
	Value,
} from '../openapi.js';

describe('OpenAPI helpers', () => {
	it('should accept typed IDs and reject raw TSIDs', () => {
		expect(Value.Check(CommonSchemas.TypedId, 'dol_0HZXEQ5Y8JY5Z')).toBe(true);
		expect(Value.Check(CommonSchemas.TypedId, '0HZXEQ5Y8JY5Z')).toBe(false);
	});

	it('should build the offset page shape', () => {
		const schema = paginatedResponse(Type.Object({ id: Type.String() }));

		expect(Value.Check(schema, { items: [{ id: 'a' }], total: 1, limit: 50, offset: 0 })).toBe(true);
		expect(Value.Check(schema, { items: [], total: 0 })).toBe(false);
	});

	it('should build the unpaginated list shape', () => {
		const schema = listResponse(Type.String());

		expect(Value.Check(schema, { items: ['a', 'b'], total: 2 })).toBe(true);
	});

	it('should combine response definitions by status', () => {
		const responses = combineResponses(
			{ 200: Type.Object({}) },
			OpenAPIResponses.notFound('Doll not found'),
			OpenAPIResponses.gone(),
		);

		expect(Object.keys(responses)).toEqual(['200', '404', '410']);
		expect(OpenAPIResponses.gone()[410].description).toBe('Resource already deleted');
	});

	it('should return validated data', () => {
		const schema = Type.Object({ name: Type.String() });

		expect(validateBody({ name: 'Ann' }, schema)).toEqual({ name: 'Ann' });
		expect(() => validateBody({ name: 1 }, schema)).toThrow(/^Validation failed: \/name: /);
	});

	it('should report errors without throwing', () => {
		const schema = Type.Object({ name: Type.String() });

		expect(safeValidate({ name: 'Ann' }, schema)).toEqual({ success: true, data: { name: 'Ann' } });
		const failed = safeValidate({}, schema);
		expect(failed.success).toBe(false);
	});
});
