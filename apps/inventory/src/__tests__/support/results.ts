import { Result, type UseCaseError } from '@dollhouse/application';

import { readEventBody, type DollEventBody } from '../../domain/index.js';
import type { DollEventEntry } from '../../infrastructure/persistence/index.js';

export function successValue<T>(result: Result<T>): T {
	if (Result.isFailure(result)) {
		throw new Error(`Expected success, got ${result.error.code}: ${result.error.message}`);
	}
	return result.value;
}

export function failureError<T>(result: Result<T>): UseCaseError {
	if (Result.isSuccess(result)) {
		throw new Error('Expected failure, got success');
	}
	return result.error;
}

type PayloadOf<K extends DollEventBody['event_type']> = Extract<DollEventBody, { event_type: K }>['payload'];

function isBodyOf<K extends DollEventBody['event_type']>(
	body: DollEventBody,
	type: K,
): body is Extract<DollEventBody, { event_type: K }> {
	return body.event_type === type;
}

/**
 * Typed payloads of the stored events of one type, in commit order.
 */
export function payloadsOf<K extends DollEventBody['event_type']>(
	events: readonly DollEventEntry[],
	type: K,
): PayloadOf<K>[] {
	const payloads: PayloadOf<K>[] = [];
	for (const event of events) {
		const body = readEventBody(event.eventType, event.payload);
		if (body && isBodyOf(body, type)) {
			payloads.push(body.payload);
		}
	}
	return payloads;
}
