/**
 * Doll Use Cases
 */

export * from './create-doll/index.js';
export * from './update-doll/index.js';
export * from './delete-doll/index.js';
