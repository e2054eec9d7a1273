/**
 * Database Schema
 *
 * Tables of the inventory service. The audit log table is shared and lives
 * in @dollhouse/persistence.
 */

export { auditLogs, type AuditLogRecord, type NewAuditLog } from '@dollhouse/persistence';

export { containers, type ContainerRecord, type NewContainerRecord } from './containers.js';
export { dolls, type DollRecord, type NewDollRecord } from './dolls.js';
export { photos, type PhotoRecord, type NewPhotoRecord } from './photos.js';
export { dollEvents, type DollEventRecord, type NewDollEventRecord } from './doll-events.js';
