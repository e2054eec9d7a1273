import { describe, it, expect } from 'vitest';
import { generate, parse, isTypedId, typeOf, EntityType } from '../typed-id.js';

describe('Typed IDs', () => {
	it('should prefix generated IDs with the entity type', () => {
		expect(generate('DOLL')).toMatch(/^dol_[0-9A-HJKMNP-TV-Z]{13}$/);
		expect(generate('CONTAINER')).toMatch(/^ctr_/);
		expect(generate('PHOTO')).toMatch(/^pho_/);
		expect(generate('EVENT')).toMatch(/^evn_/);
		expect(generate('AUDIT_LOG')).toMatch(/^aud_/);
	});

	it('should parse a well-formed ID', () => {
		expect(parse('dol_0J1M8Q3ZV6B4K')).toEqual({ prefix: 'dol', tsid: '0J1M8Q3ZV6B4K' });
	});

	it('should reject malformed IDs', () => {
		expect(parse('0J1M8Q3ZV6B4K')).toBeNull();
		expect(parse('doll_0J1M8Q3ZV6B4K')).toBeNull();
		expect(parse('dol_short')).toBeNull();
	});

	it('should check the entity type', () => {
		const id = generate('PHOTO');
		expect(isTypedId('PHOTO', id)).toBe(true);
		expect(isTypedId('DOLL', id)).toBe(false);
	});

	it('should resolve the entity type from the prefix', () => {
		expect(typeOf(generate('CONTAINER'))).toBe('CONTAINER');
		expect(typeOf('zzz_0J1M8Q3ZV6B4K')).toBeNull();
		expect(typeOf('garbage')).toBeNull();
	});

	it('should use three-letter prefixes', () => {
		for (const prefix of Object.values(EntityType)) {
			expect(prefix).toHaveLength(3);
		}
	});
});
