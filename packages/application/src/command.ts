/**
 * Command Types
 *
 * Commands are the input to write operations. They are plain, readonly data
 * objects named in imperative form (`CreateDoll`, `MoveDoll`). Validation
 * lives in the use case, not the command.
 *
 * @example
 * ```typescript
 * interface UpdateDollCommand extends Command {
 *     readonly dollId: string;
 *     readonly name?: string;         // undefined = no change
 *     readonly containerId?: string;  // undefined = no change
 * }
 * ```
 */

/**
 * Base marker interface for commands.
 */
export interface Command {
	/**
	 * Operation name recorded in the audit log. Falls back to the event type
	 * when absent.
	 */
	readonly _type?: string;
}

export type DeleteCommand<TIdField extends string = 'id'> = Command & {
	readonly [K in TIdField]: string;
};

/**
 * Create a command with an explicit operation name.
 *
 * @example
 * ```typescript
 * const command = createCommand('CreateDoll', { name: 'Ann', containerId: null });
 * // command._type === 'CreateDoll'
 * ```
 */
export function createCommand<T extends Record<string, unknown>>(type: string, data: T): Command & T {
	return { _type: type, ...data };
}
