/**
 * Time-Sorted IDs
 *
 * A TSID packs 42 bits of milliseconds since 2020-01-01 and a 22-bit counter
 * into a 64-bit value, rendered as 13 Crockford Base32 characters.
 *
 * Within one process IDs are strictly increasing: the counter starts at a
 * random value each millisecond and increments for every ID issued in the
 * same millisecond, so lexicographic order of the strings is creation order.
 */

import { randomInt } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const LENGTH = 13;
const EPOCH = 1577836800000n;
const COUNTER_BITS = 22n;
const COUNTER_MASK = (1n << COUNTER_BITS) - 1n;

// Random start stays in the lower half of the counter range.
const COUNTER_START_LIMIT = 1 << 21;

const VALID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{13}$/i;

let lastMillis = -1n;
let counter = 0n;

function elapsed(): bigint {
	return BigInt(Date.now()) - EPOCH;
}

function nextValue(): bigint {
	let millis = elapsed();

	if (millis <= lastMillis) {
		// Same millisecond, or the clock stepped back: keep counting on the last one.
		millis = lastMillis;
		counter = (counter + 1n) & COUNTER_MASK;
		if (counter === 0n) {
			while (elapsed() <= lastMillis) {
				// wait for the clock to leave the exhausted millisecond
			}
			millis = elapsed();
			counter = BigInt(randomInt(COUNTER_START_LIMIT));
		}
	} else {
		counter = BigInt(randomInt(COUNTER_START_LIMIT));
	}

	lastMillis = millis;
	return (millis << COUNTER_BITS) | counter;
}

function encode(value: bigint): string {
	let out = '';
	let rest = value;
	for (let i = 0; i < LENGTH; i++) {
		out = ALPHABET.charAt(Number(rest & 31n)) + out;
		rest >>= 5n;
	}
	return out;
}

function decode(text: string): bigint {
	if (!isValid(text)) {
		throw new Error(`Invalid TSID: ${text}`);
	}
	let value = 0n;
	for (const char of text.toUpperCase()) {
		value = (value << 5n) | BigInt(ALPHABET.indexOf(char));
	}
	return value;
}

/**
 * Generate a new 13-character TSID.
 */
export function generate(): string {
	return encode(nextValue());
}

/**
 * Whether a string has the shape of a TSID.
 */
export function isValid(text: string): boolean {
	return VALID_PATTERN.test(text);
}

/**
 * The creation time embedded in a TSID.
 */
export function getTimestamp(text: string): Date {
	return new Date(Number((decode(text) >> COUNTER_BITS) + EPOCH));
}

/**
 * Compare two TSIDs by creation order, for use with `Array.prototype.sort`.
 */
export function compare(a: string, b: string): number {
	const left = decode(a);
	const right = decode(b);
	if (left === right) return 0;
	return left < right ? -1 : 1;
}
