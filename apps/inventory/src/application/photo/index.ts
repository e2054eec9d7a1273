/**
 * Photo Use Cases
 */

export * from './add-photo/index.js';
export * from './set-primary-photo/index.js';
