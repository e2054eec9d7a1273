export * from './container/index.js';
export * from './doll/index.js';
export * from './photo/index.js';
