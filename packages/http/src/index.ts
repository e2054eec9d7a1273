/**
 * @dollhouse/http
 *
 * HTTP layer utilities for Fastify services:
 * - Plugins for tracing, principal resolution, and execution context
 * - Result to HTTP response mapping
 * - TypeBox schema helpers for OpenAPI
 * - Pino logger options (Fastify's native logger)
 *
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     logger: createFastifyLoggerOptions({ serviceName: 'inventory' }),
 * });
 *
 * await fastify.register(tracingPlugin);
 * await fastify.register(auditPlugin, { skipPaths: ['/health'], resolvePrincipal });
 * await fastify.register(executionContextPlugin);
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 *
 * fastify.post('/api/dolls', async (request, reply) => {
 *     const result = await createDoll.execute(request.body, requireExecutionContext(request));
 *     return sendResult(reply, result, { successStatus: 201 });
 * });
 * ```
 */

// Types
export type {
	TracingData,
	AuditData,
	TracingPluginOptions,
	AuditPluginOptions,
	PrincipalResolution,
	ErrorResponse,
	FastifyRequest,
	FastifyReply,
	Logger,
} from './types.js';

// Plugins
export {
	tracingPlugin,
	headerValue,
	auditPlugin,
	requirePrincipal,
	executionContextPlugin,
	requireExecutionContext,
} from './plugins/index.js';

// Logging
export { createFastifyLoggerOptions, type LoggingConfig } from './logging.js';

// Response utilities
export {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	sendError,
	jsonSuccess,
	jsonCreated,
	notFound,
	unauthorized,
	forbidden,
	badRequest,
	type SendResultOptions,
} from './response.js';

// Error handler
export {
	HttpError,
	errorHandlerPlugin,
	createCommonErrorMappers,
	createStandardErrorHandlerOptions,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

// OpenAPI utilities
export {
	CommonSchemas,
	ErrorResponseSchema,
	type ErrorResponseType,
	paginatedResponse,
	listResponse,
	OpenAPIResponses,
	combineResponses,
	validateBody,
	safeValidate,
	Type,
	Value,
	type Static,
	type TSchema,
	type TObject,
} from './openapi.js';
