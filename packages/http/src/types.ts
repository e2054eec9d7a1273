/**
 * HTTP Layer Types
 *
 * Type definitions for the HTTP layer including Fastify request decorators
 * and plugin options.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Principal, ExecutionContext, UseCaseError } from '@dollhouse/domain-core';
import type { Logger } from 'pino';

/**
 * Tracing data stored in request context.
 */
export interface TracingData {
	/** Correlation ID (from header or generated) */
	readonly correlationId: string;
	/** Causation ID from header, may be null */
	readonly causationId: string | null;
	/** Unique execution ID for this request */
	readonly executionId: string;
	/** Request start time */
	readonly startTime: number;
}

/**
 * Audit data stored in request context.
 */
export interface AuditData {
	/** Identity ID of the caller (null if not authenticated) */
	readonly principalId: string | null;
	readonly principal: Principal | null;
	/** Why the caller could not be authenticated, if resolution failed */
	readonly authError: UseCaseError | null;
}

export interface TracingPluginOptions {
	/** Header name for correlation ID (default: X-Correlation-ID) */
	readonly correlationIdHeader?: string;
	/** Alternative header name for correlation ID (default: X-Request-ID) */
	readonly requestIdHeader?: string;
	/** Header name for causation ID (default: X-Causation-ID) */
	readonly causationIdHeader?: string;
	/** Whether to add correlation ID to response headers (default: true) */
	readonly propagateToResponse?: boolean;
}

/**
 * Outcome of resolving the caller of a request.
 */
export type PrincipalResolution =
	| { readonly authenticated: true; readonly principal: Principal }
	| { readonly authenticated: false; readonly error: UseCaseError };

export interface AuditPluginOptions {
	/** Path prefixes that skip authentication (e.g., /health, /docs) */
	readonly skipPaths?: string[];
	/** Establish the principal from the request */
	readonly resolvePrincipal: (request: FastifyRequest) => PrincipalResolution | Promise<PrincipalResolution>;
}

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	/** Additional error details */
	readonly details?: Record<string, unknown>;
}

declare module 'fastify' {
	interface FastifyRequest {
		tracing: TracingData;
		audit: AuditData;
		/** Null until a principal has been resolved */
		executionContext: ExecutionContext | null;
	}
}

export type { FastifyRequest, FastifyReply, Logger };
