/**
 * Schema Exports
 *
 * Shared schema definitions. Application tables live with the application.
 */

export { tsidColumn, identityColumn, timestampColumn } from './common.js';

export { auditLogs, type AuditLogRecord, type NewAuditLog } from './audit-logs.js';
