import { describe, it, expect } from 'vitest';
import { generate, isValid, getTimestamp, compare } from '../tsid.js';

describe('TSID generation', () => {
	it('should generate a 13-character Crockford Base32 string', () => {
		const id = generate();
		expect(id).toHaveLength(13);
		expect(id).toMatch(/^[0-9A-HJKMNP-TV-Z]{13}$/);
	});

	it('should generate unique IDs in a tight loop', () => {
		const ids = new Set<string>();
		for (let i = 0; i < 10000; i++) {
			ids.add(generate());
		}
		expect(ids.size).toBe(10000);
	});

	it('should generate IDs in creation order', () => {
		const ids = Array.from({ length: 500 }, () => generate());
		expect([...ids].sort()).toEqual(ids);
		expect([...ids].sort(compare)).toEqual(ids);
	});

	it('should embed the creation time', () => {
		const before = Date.now();
		const id = generate();
		const after = Date.now();

		const time = getTimestamp(id).getTime();
		expect(time).toBeGreaterThanOrEqual(before);
		expect(time).toBeLessThanOrEqual(after);
	});
});

describe('isValid', () => {
	it('should accept generated IDs in either case', () => {
		const id = generate();
		expect(isValid(id)).toBe(true);
		expect(isValid(id.toLowerCase())).toBe(true);
	});

	it('should reject wrong lengths and excluded letters', () => {
		expect(isValid('0123')).toBe(false);
		expect(isValid('0123456789ABCD')).toBe(false);
		expect(isValid('0123456789ABU')).toBe(false);
	});
});

describe('compare', () => {
	it('should return 0 for the same ID', () => {
		const id = generate();
		expect(compare(id, id)).toBe(0);
	});

	it('should throw for malformed input', () => {
		expect(() => compare('nope', generate())).toThrow('Invalid TSID: nope');
	});
});
