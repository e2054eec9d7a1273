import { describe, it, expect } from 'vitest';
import { DomainEvent, BaseDomainEvent } from '../domain-event.js';
import { ExecutionContext } from '../execution-context.js';

interface WidgetRenamedData {
	old_name: string;
	new_name: string;
}

class WidgetRenamed extends BaseDomainEvent<'WIDGET_RENAMED', WidgetRenamedData> {
	static readonly EVENT_TYPE = 'WIDGET_RENAMED';

	constructor(ctx: ExecutionContext, widgetId: string, data: WidgetRenamedData) {
		super(WidgetRenamed.EVENT_TYPE, widgetId, ctx, data);
	}
}

function makeContext(): ExecutionContext {
	return ExecutionContext.create(
		{
			identity: { id: 'bob', email: 'bob@example.test', displayName: 'bob', groups: new Set() },
			permissions: new Set(),
		},
		{ correlationId: 'corr-456', causationId: 'cause-789' },
	);
}

describe('DomainEvent', () => {
	describe('generateId', () => {
		it('should generate unique event IDs', () => {
			const ids = new Set<string>();
			for (let i = 0; i < 100; i++) {
				ids.add(DomainEvent.generateId());
			}
			expect(ids.size).toBe(100);
		});

		it('should prefix event IDs', () => {
			expect(DomainEvent.generateId()).toMatch(/^evn_[0-9A-Z]{13}$/);
		});
	});

	describe('metadataFrom', () => {
		it('should copy tracing IDs and the principal from the context', () => {
			const ctx = makeContext();
			const metadata = DomainEvent.metadataFrom(ctx);

			expect(metadata.eventId).toMatch(/^evn_/);
			expect(metadata.executionId).toBe(ctx.executionId);
			expect(metadata.correlationId).toBe('corr-456');
			expect(metadata.causationId).toBe('cause-789');
			expect(metadata.principalId).toBe('bob');
			expect(metadata.occurredAt).toBeInstanceOf(Date);
		});
	});
});

describe('BaseDomainEvent', () => {
	it('should carry type, subject and data', () => {
		const ctx = makeContext();
		const event = new WidgetRenamed(ctx, 'wid_1', { old_name: 'Ann', new_name: 'Anna' });

		expect(event.eventType).toBe('WIDGET_RENAMED');
		expect(event.subject).toBe('wid_1');
		expect(event.principalId).toBe('bob');
		expect(event.executionId).toBe(ctx.executionId);
		expect(event.data).toEqual({ old_name: 'Ann', new_name: 'Anna' });
	});

	it('should serialize the payload', () => {
		const event = new WidgetRenamed(makeContext(), 'wid_1', { old_name: 'Ann', new_name: 'Anna' });

		expect(event.toDataJson()).toBe('{"old_name":"Ann","new_name":"Anna"}');
		expect(DomainEvent.dataJson(event)).toBe('{"old_name":"Ann","new_name":"Anna"}');
	});
});
