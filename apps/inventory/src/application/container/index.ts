/**
 * Container Use Cases
 */

export * from './create-container/index.js';
export * from './update-container/index.js';
export * from './reorder-container/index.js';
export * from './delete-container/index.js';
