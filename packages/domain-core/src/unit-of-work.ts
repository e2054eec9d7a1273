/**
 * Unit of Work Pattern
 *
 * Commits aggregate changes, their domain events and the audit log entry
 * atomically within a single database transaction.
 *
 * **This is the ONLY way to create a successful Result.** `Result.success()`
 * needs a token only UnitOfWork implementations hold, so:
 * - every state change is committed together with its event
 * - every committed use case leaves an audit log row
 * - a failed commit leaves neither state nor event behind
 *
 * ```typescript
 * async execute(cmd: RenameDollCommand, ctx: ExecutionContext): Promise<Result<DollRenamed>> {
 *     const name = cmd.name.trim();
 *     if (!name) {
 *         return Result.failure(UseCaseError.validation('NAME_REQUIRED', 'Name is required'));
 *     }
 *
 *     const renamed = Doll.rename(doll, name);
 *     const event = new DollRenamed(ctx, doll.id, { old_name: doll.name, new_name: name });
 *
 *     return unitOfWork.commit(renamed, event, cmd);
 * }
 * ```
 */

import type { DomainEvent } from './domain-event.js';
import type { Result } from './result.js';

/**
 * Aggregate entity. The `id` is a typed TSID whose prefix names the type.
 */
export interface Aggregate {
	readonly id: string;
}

export interface UnitOfWork {
	/**
	 * Persist one aggregate together with its event.
	 *
	 * @param command - The executed command, recorded in the audit log
	 */
	commit<T extends DomainEvent>(aggregate: Aggregate, event: T, command: unknown): Promise<Result<T>>;

	/**
	 * Persist several aggregates under one event, e.g. both containers of a
	 * sort-order swap.
	 */
	commitAll<T extends DomainEvent>(aggregates: readonly Aggregate[], event: T, command: unknown): Promise<Result<T>>;

	/**
	 * Persist aggregates with any number of events in one transaction.
	 *
	 * Used where one command makes several independent changes, each recorded
	 * as its own event. With no events nothing changed, so nothing is written.
	 */
	commitBatch<T extends DomainEvent>(
		aggregates: readonly Aggregate[],
		events: readonly T[],
		command: unknown,
	): Promise<Result<readonly T[]>>;
}

export { RESULT_SUCCESS_TOKEN, type ResultSuccessToken } from './result.js';
