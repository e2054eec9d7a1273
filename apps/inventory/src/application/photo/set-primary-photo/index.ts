export * from './command.js';
export * from './use-case.js';
