/**
 * @dollhouse/tsid
 *
 * Time-sorted, prefixed identifiers.
 *
 * @example
 * ```typescript
 * import { generate, isTypedId } from '@dollhouse/tsid';
 *
 * const id = generate('DOLL'); // "dol_0J1M8Q3ZV6B4K"
 * isTypedId('DOLL', id); // true
 * ```
 */

export { generate as generateRaw, isValid, getTimestamp, compare } from './tsid.js';

export {
	EntityType,
	SEPARATOR,
	type EntityTypeKey,
	type EntityTypePrefix,
	generate,
	parse,
	isTypedId,
	typeOf,
} from './typed-id.js';
