import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { UseCaseError, type Principal } from '@dollhouse/domain-core';
import {
	tracingPlugin,
	headerValue,
	auditPlugin,
	requirePrincipal,
	executionContextPlugin,
	requireExecutionContext,
} from '../plugins/index.js';
import { errorHandlerPlugin, createStandardErrorHandlerOptions } from '../error-handler.js';
import type { PrincipalResolution } from '../types.js';

const principal: Principal = {
	identity: {
		id: 'ann',
		email: 'ann@example.test',
		displayName: 'ann',
		groups: new Set(['dolls_editor']),
	},
	permissions: new Set(['doll:read']),
};

function resolveFromHeader(user: string | undefined): PrincipalResolution {
	if (user === 'ann') {
		return { authenticated: true, principal };
	}
	return {
		authenticated: false,
		error: UseCaseError.unauthenticated('MISSING_IDENTITY_HEADERS', 'Missing forwarded identity headers'),
	};
}

describe('headerValue', () => {
	it('should return the first value of a repeated header', () => {
		expect(headerValue(['a', 'b'])).toBe('a');
	});

	it('should treat blank values as absent', () => {
		expect(headerValue('   ')).toBeUndefined();
		expect(headerValue(undefined)).toBeUndefined();
	});

	it('should trim the value', () => {
		expect(headerValue('  abc ')).toBe('abc');
	});
});

describe('tracingPlugin', () => {
	let app: FastifyInstance;

	beforeEach(async () => {
		app = Fastify();
		await app.register(tracingPlugin);
		app.get('/trace', async (request) => request.tracing);
	});

	afterEach(async () => {
		await app.close();
	});

	it('should use the correlation ID header and echo it back', async () => {
		const response = await app.inject({
			method: 'GET',
			url: '/trace',
			headers: { 'x-correlation-id': 'corr-1', 'x-causation-id': 'cause-1' },
		});

		const body = response.json();
		expect(body.correlationId).toBe('corr-1');
		expect(body.causationId).toBe('cause-1');
		expect(body.executionId).toMatch(/^exec-/);
		expect(response.headers['x-correlation-id']).toBe('corr-1');
	});

	it('should fall back to the request ID header', async () => {
		const response = await app.inject({ method: 'GET', url: '/trace', headers: { 'x-request-id': 'req-7' } });

		expect(response.json().correlationId).toBe('req-7');
	});

	it('should generate a correlation ID when none is sent', async () => {
		const response = await app.inject({ method: 'GET', url: '/trace' });

		const body = response.json();
		expect(body.correlationId).toMatch(/^trace-/);
		expect(body.causationId).toBeNull();
		expect(response.headers['x-correlation-id']).toBe(body.correlationId);
	});
});

describe('auditPlugin', () => {
	let app: FastifyInstance;

	beforeEach(async () => {
		app = Fastify();
		await app.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
		await app.register(auditPlugin, {
			skipPaths: ['/health'],
			resolvePrincipal: (request) => resolveFromHeader(headerValue(request.headers['x-forwarded-user'])),
		});
		app.get('/health', async (request) => ({ principalId: request.audit.principalId }));
		app.get('/api/me', async (request) => ({ id: requirePrincipal(request).identity.id }));
	});

	afterEach(async () => {
		await app.close();
	});

	it('should store the resolved principal', async () => {
		const response = await app.inject({ method: 'GET', url: '/api/me', headers: { 'x-forwarded-user': 'ann' } });

		expect(response.statusCode).toBe(200);
		expect(response.json()).toEqual({ id: 'ann' });
	});

	it('should reject with the resolver error when resolution fails', async () => {
		const response = await app.inject({ method: 'GET', url: '/api/me' });

		expect(response.statusCode).toBe(401);
		expect(response.json()).toEqual({
			code: 'MISSING_IDENTITY_HEADERS',
			message: 'Missing forwarded identity headers',
		});
	});

	it('should not resolve a principal on skipped paths', async () => {
		const response = await app.inject({ method: 'GET', url: '/health?x=1', headers: { 'x-forwarded-user': 'ann' } });

		expect(response.json()).toEqual({ principalId: null });
	});
});

describe('executionContextPlugin', () => {
	let app: FastifyInstance;

	beforeEach(async () => {
		app = Fastify();
		await app.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
		await app.register(tracingPlugin);
		await app.register(auditPlugin, {
			skipPaths: ['/public'],
			resolvePrincipal: (request) => resolveFromHeader(headerValue(request.headers['x-forwarded-user'])),
		});
		await app.register(executionContextPlugin);
		app.get('/ctx', async (request) => {
			const ctx = requireExecutionContext(request);
			return { correlationId: ctx.correlationId, principalId: ctx.principal.identity.id };
		});
		app.get('/public/ctx', async (request) => {
			requireExecutionContext(request);
			return { ok: true };
		});
	});

	afterEach(async () => {
		await app.close();
	});

	it('should build the context from tracing and principal', async () => {
		const response = await app.inject({
			method: 'GET',
			url: '/ctx',
			headers: { 'x-forwarded-user': 'ann', 'x-correlation-id': 'corr-9' },
		});

		expect(response.json()).toEqual({ correlationId: 'corr-9', principalId: 'ann' });
	});

	it('should reject with 401 when the resolver failed', async () => {
		const response = await app.inject({ method: 'GET', url: '/ctx', headers: { 'x-forwarded-user': 'bob' } });

		expect(response.statusCode).toBe(401);
		expect(response.json().code).toBe('MISSING_IDENTITY_HEADERS');
	});

	it('should reject with UNAUTHENTICATED when no resolution was attempted', async () => {
		const response = await app.inject({ method: 'GET', url: '/public/ctx' });

		expect(response.statusCode).toBe(401);
		expect(response.json()).toEqual({ code: 'UNAUTHENTICATED', message: 'Authentication required' });
	});
});
