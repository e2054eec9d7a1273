/**
 * Fastify Plugins
 */

export { tracingPlugin, headerValue } from './tracing.js';
export { auditPlugin, requirePrincipal } from './audit.js';
export { executionContextPlugin, requireExecutionContext } from './execution-context.js';
