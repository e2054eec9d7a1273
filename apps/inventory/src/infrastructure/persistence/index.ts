/**
 * Persistence Layer
 */

// Schema
export * from './schema/index.js';

// Repositories
export * from './repositories/index.js';

// Writes
export { containerHandler, dollHandler, photoHandler } from './aggregate-handlers.js';
export { createDollEventWriter, toDollEventRecords } from './doll-event-writer.js';
