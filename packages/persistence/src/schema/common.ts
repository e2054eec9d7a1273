/**
 * Common Schema Definitions
 *
 * Shared column definitions used across tables.
 */

import { varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * Typed ID column - 17-character prefixed TSID.
 * Format: "{prefix}_{tsid}" (e.g., "dol_0HZXEQ5Y8JY5Z")
 * - 3-character prefix
 * - 1 underscore separator
 * - 13-character Crockford Base32 TSID
 */
export const tsidColumn = (name: string) => varchar(name, { length: 17 });

/**
 * Identity reference column. Identities come from the auth layer (local
 * identity or forwarded user header), so they are not TSIDs.
 */
export const identityColumn = (name: string) => varchar(name, { length: 255 });

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });
