/**
 * Validation Utilities
 *
 * Helpers for common input checks in use cases. Every helper returns a
 * Result so a use case can return the failure as-is.
 *
 * @example
 * ```typescript
 * const name = validateName(command.name, 'name', 255);
 * if (Result.isFailure(name)) return Result.failure(name.error);
 * ```
 */

import { Result, UseCaseError } from '@dollhouse/domain-core';

/**
 * Validate that a value is present and, for strings, not blank.
 */
export function validateRequired<T>(
	value: T | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<NonNullable<T>> {
	if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} is required`, { field: fieldName }),
		);
	}

	return unsafeSuccess(value);
}

export function validateMaxLength(
	value: string,
	maxLength: number,
	fieldName: string,
	errorCode: string,
): Result<string> {
	if (value.length > maxLength) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be ${maxLength} characters or less`, {
				field: fieldName,
				length: value.length,
				maxLength,
			}),
		);
	}

	return unsafeSuccess(value);
}

/**
 * Trim a display name and check it is non-blank and within `maxLength`.
 * Succeeds with the trimmed value.
 *
 * Error codes are derived from the field: `NAME_REQUIRED`, `NAME_TOO_LONG`.
 */
export function validateName(value: string | null | undefined, fieldName: string, maxLength: number): Result<string> {
	const prefix = fieldName.toUpperCase();
	const trimmed = (value ?? '').trim();

	const required = validateRequired(trimmed, fieldName, `${prefix}_REQUIRED`);
	if (Result.isFailure(required)) return required;

	return validateMaxLength(trimmed, maxLength, fieldName, `${prefix}_TOO_LONG`);
}

/**
 * Success results for validation. Validation runs before any state change,
 * so the success it reports never stands in for a commit.
 */
function unsafeSuccess<T>(value: T): Result<T> {
	return { _tag: 'success', value };
}
