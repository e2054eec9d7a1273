/**
 * Execution Context
 *
 * Context for a use case execution. Carries the tracing IDs and the calling
 * principal through a use case. The context is passed explicitly into every
 * `execute()` call; nothing is read from ambient request state.
 */

import { generateRaw } from '@dollhouse/tsid';

/**
 * The caller as established by the identity resolver.
 */
export interface Identity {
	readonly id: string;
	readonly email: string;
	readonly displayName: string;
	readonly groups: ReadonlySet<string>;
}

/**
 * An identity together with the permissions its groups grant.
 */
export interface Principal {
	readonly identity: Identity;
	readonly permissions: ReadonlySet<string>;
}

export interface ExecutionContext {
	/** Unique ID for this execution */
	readonly executionId: string;
	/** ID for tracing (usually from the incoming request) */
	readonly correlationId: string;
	/** ID of whatever caused this execution, if known */
	readonly causationId: string | null;
	readonly principal: Principal;
	readonly initiatedAt: Date;
}

export interface TracingIds {
	readonly correlationId?: string | null;
	readonly causationId?: string | null;
}

function generateExecutionId(): string {
	return `exec-${generateRaw()}`;
}

export const ExecutionContext = {
	/**
	 * Create a context for a fresh execution.
	 *
	 * Without a correlation ID the execution ID doubles as one.
	 */
	create(principal: Principal, tracing: TracingIds = {}): ExecutionContext {
		const executionId = generateExecutionId();
		return {
			executionId,
			correlationId: tracing.correlationId ?? executionId,
			causationId: tracing.causationId ?? null,
			principal,
			initiatedAt: new Date(),
		};
	},

	/**
	 * Child context within the same execution with a new causation ID.
	 */
	withCausation(context: ExecutionContext, causingId: string): ExecutionContext {
		return {
			...context,
			causationId: causingId,
			initiatedAt: new Date(),
		};
	},

	principalId(context: ExecutionContext): string {
		return context.principal.identity.id;
	},

	hasPermission(context: ExecutionContext, permission: string): boolean {
		return context.principal.permissions.has(permission);
	},
};
