import { describe, it, expect } from 'vitest';
import { ExecutionContext, type Principal } from '../execution-context.js';

const principal: Principal = {
	identity: {
		id: 'alice',
		email: 'alice@example.test',
		displayName: 'alice',
		groups: new Set(['dolls_editor']),
	},
	permissions: new Set(['doll:read', 'doll:rename']),
};

describe('ExecutionContext', () => {
	describe('create', () => {
		it('should create context with generated execution ID', () => {
			const ctx = ExecutionContext.create(principal);

			expect(ctx.executionId).toMatch(/^exec-[0-9A-Z]{13}$/);
			expect(ctx.principal).toBe(principal);
			expect(ctx.initiatedAt).toBeInstanceOf(Date);
		});

		it('should use execution ID as correlation ID without tracing IDs', () => {
			const ctx = ExecutionContext.create(principal);

			expect(ctx.correlationId).toBe(ctx.executionId);
			expect(ctx.causationId).toBeNull();
		});

		it('should take tracing IDs from the request', () => {
			const ctx = ExecutionContext.create(principal, { correlationId: 'corr-1', causationId: 'cause-1' });

			expect(ctx.correlationId).toBe('corr-1');
			expect(ctx.causationId).toBe('cause-1');
		});

		it('should fall back when tracing IDs are null', () => {
			const ctx = ExecutionContext.create(principal, { correlationId: null, causationId: null });

			expect(ctx.correlationId).toBe(ctx.executionId);
			expect(ctx.causationId).toBeNull();
		});
	});

	describe('withCausation', () => {
		it('should keep the execution and correlation IDs', () => {
			const ctx = ExecutionContext.create(principal, { correlationId: 'corr-1' });
			const child = ExecutionContext.withCausation(ctx, 'evn_0J1M8Q3ZV6B4K');

			expect(child.executionId).toBe(ctx.executionId);
			expect(child.correlationId).toBe('corr-1');
			expect(child.causationId).toBe('evn_0J1M8Q3ZV6B4K');
			expect(child.principal).toBe(principal);
		});
	});

	describe('principal helpers', () => {
		it('should expose the identity ID and permission checks', () => {
			const ctx = ExecutionContext.create(principal);

			expect(ExecutionContext.principalId(ctx)).toBe('alice');
			expect(ExecutionContext.hasPermission(ctx, 'doll:rename')).toBe(true);
			expect(ExecutionContext.hasPermission(ctx, 'doll:delete')).toBe(false);
		});
	});
});
