/**
 * Typed IDs
 *
 * Every aggregate ID carries a three-letter prefix naming its type, joined to
 * a TSID with an underscore: `dol_0J1M8Q3ZV6B4K`. The prefix is stored with
 * the ID, so IDs read the same in the API, the database and the logs.
 */

import { generate as generateTsid, isValid } from './tsid.js';

export const EntityType = {
	DOLL: 'dol',
	CONTAINER: 'ctr',
	PHOTO: 'pho',
	EVENT: 'evn',
	AUDIT_LOG: 'aud',
} as const;

export type EntityTypeKey = keyof typeof EntityType;
export type EntityTypePrefix = (typeof EntityType)[EntityTypeKey];

export const SEPARATOR = '_';

const PREFIX_LENGTH = 3;

/**
 * Generate a new ID for an entity type, e.g. `generate('DOLL')`.
 */
export function generate(type: EntityTypeKey): string {
	return `${EntityType[type]}${SEPARATOR}${generateTsid()}`;
}

/**
 * Split a typed ID into prefix and TSID, or null when it is malformed.
 */
export function parse(id: string): { prefix: string; tsid: string } | null {
	if (id.indexOf(SEPARATOR) !== PREFIX_LENGTH) return null;

	const prefix = id.slice(0, PREFIX_LENGTH);
	const tsid = id.slice(PREFIX_LENGTH + 1);
	if (!isValid(tsid)) return null;

	return { prefix, tsid };
}

/**
 * Whether `id` is a well-formed ID of the given entity type.
 */
export function isTypedId(type: EntityTypeKey, id: string): boolean {
	return parse(id)?.prefix === EntityType[type];
}

/**
 * Resolve the entity type of an ID from its prefix.
 */
export function typeOf(id: string): EntityTypeKey | null {
	const parsed = parse(id);
	if (!parsed) return null;

	for (const key of Object.keys(EntityType)) {
		if (isEntityTypeKey(key) && EntityType[key] === parsed.prefix) {
			return key;
		}
	}
	return null;
}

function isEntityTypeKey(key: string): key is EntityTypeKey {
	return Object.hasOwn(EntityType, key);
}
