/**
 * Result Type for Use Case Execution
 *
 * A discriminated union with two variants:
 * - Success<T> - the committed value
 * - Failure<T> - the error that stopped the use case
 *
 * `Result.success()` needs a token that only UnitOfWork implementations hold,
 * so a use case can only report success by committing its state change
 * together with the event that describes it.
 *
 * ```typescript
 * if (!name) {
 *     return Result.failure(UseCaseError.validation('NAME_REQUIRED', 'Name is required'));
 * }
 * return unitOfWork.commit(doll, event, command);
 * ```
 */

import type { UseCaseError } from './errors.js';

/**
 * Token for authorizing Result.success() creation.
 *
 * @internal
 */
export const RESULT_SUCCESS_TOKEN: unique symbol = Symbol('RESULT_SUCCESS_TOKEN');

/**
 * @internal
 */
export type ResultSuccessToken = typeof RESULT_SUCCESS_TOKEN;

export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

export interface Failure<T> {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
	/** Phantom marker tying the failure to the value type it stands in for. */
	readonly _value?: T;
}

export type Result<T> = Success<T> | Failure<T>;

export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

export function isFailure<T>(result: Result<T>): result is Failure<T> {
	return result._tag === 'failure';
}

export const Result = {
	/**
	 * Create a successful result.
	 *
	 * **RESTRICTED:** requires the success token. Use cases return success
	 * through `unitOfWork.commit()`.
	 *
	 * @throws Error if the token is not the success token
	 * @internal
	 */
	success<T>(token: ResultSuccessToken, value: T): Success<T> {
		if (token !== RESULT_SUCCESS_TOKEN) {
			throw new Error(
				'Result.success() is restricted. Use UnitOfWork.commit() to create successful results, ' +
					'so every state change is recorded with its event.',
			);
		}
		return { _tag: 'success', value };
	},

	/**
	 * Create a failed result. Public: any code may fail.
	 */
	failure<T>(error: UseCaseError): Failure<T> {
		return { _tag: 'failure', error };
	},

	isSuccess,

	isFailure,

	/**
	 * Map a successful result to a new value. Failures pass through.
	 */
	map<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
		if (isSuccess(result)) {
			return { _tag: 'success', value: fn(result.value) };
		}
		return { _tag: 'failure', error: result.error };
	},

	match<T, U>(result: Result<T>, onSuccess: (value: T) => U, onFailure: (error: UseCaseError) => U): U {
		if (isSuccess(result)) {
			return onSuccess(result.value);
		}
		return onFailure(result.error);
	},

	/**
	 * @throws Error if the result is a failure
	 */
	unwrap<T>(result: Result<T>): T {
		if (isSuccess(result)) {
			return result.value;
		}
		throw new Error(`Cannot unwrap failure result: ${result.error.code} - ${result.error.message}`);
	},

	unwrapOr<T>(result: Result<T>, defaultValue: T): T {
		if (isSuccess(result)) {
			return result.value;
		}
		return defaultValue;
	},
};
