import { describe, it, expect, vi } from 'vitest';
import type { Aggregate } from '@dollhouse/domain-core';
import { createAggregateRegistry, type AggregateHandler } from '../aggregate-registry.js';

interface Widget extends Aggregate {
	readonly name: string;
}

interface Gadget extends Aggregate {
	readonly size: number;
}

interface FakeTx {
	readonly writes: string[];
}

function isWidget(aggregate: Aggregate): aggregate is Widget {
	return aggregate.id.startsWith('wid_');
}

function isGadget(aggregate: Aggregate): aggregate is Gadget {
	return aggregate.id.startsWith('gad_');
}

const widgetHandler: AggregateHandler<Widget, FakeTx> = {
	typeName: 'Widget',
	matches: isWidget,
	async persist(widget, tx) {
		tx.writes.push(`widget:${widget.name}`);
	},
};

const gadgetHandler: AggregateHandler<Gadget, FakeTx> = {
	typeName: 'Gadget',
	matches: isGadget,
	async persist(gadget, tx) {
		tx.writes.push(`gadget:${gadget.size}`);
	},
};

describe('AggregateRegistry', () => {
	it('should dispatch to the handler that claims the aggregate', async () => {
		const registry = createAggregateRegistry<FakeTx>();
		registry.register(widgetHandler);
		registry.register(gadgetHandler);
		const tx: FakeTx = { writes: [] };

		const widget: Widget = { id: 'wid_1', name: 'spinner' };
		const gadget: Gadget = { id: 'gad_1', size: 3 };
		await registry.persist(widget, tx);
		await registry.persist(gadget, tx);

		expect(tx.writes).toEqual(['widget:spinner', 'gadget:3']);
	});

	it('should resolve type names', () => {
		const registry = createAggregateRegistry<FakeTx>();
		registry.register(widgetHandler);

		const widget: Widget = { id: 'wid_1', name: 'spinner' };
		expect(registry.typeNameOf(widget)).toBe('Widget');
	});

	it('should throw for unclaimed aggregates', async () => {
		const registry = createAggregateRegistry<FakeTx>();
		registry.register(widgetHandler);

		await expect(registry.persist({ id: 'zzz_1' }, { writes: [] })).rejects.toThrow(
			'No handler registered for aggregate: zzz_1. Registered types: Widget',
		);
		expect(() => registry.typeNameOf({ id: 'zzz_1' })).toThrow('No handler registered for aggregate: zzz_1');
	});

	it('should reject a second handler for the same type', () => {
		const registry = createAggregateRegistry<FakeTx>();
		registry.register(widgetHandler);

		expect(() => registry.register(widgetHandler)).toThrow('Handler already registered for aggregate type: Widget');
	});

	it('should pass the transaction through', async () => {
		const persist = vi.fn(async (_widget: Widget, _tx: FakeTx) => undefined);
		const registry = createAggregateRegistry<FakeTx>();
		registry.register({ typeName: 'Widget', matches: isWidget, persist });
		const tx: FakeTx = { writes: [] };
		const widget: Widget = { id: 'wid_2', name: 'cog' };

		await registry.persist(widget, tx);

		expect(persist).toHaveBeenCalledWith(widget, tx);
	});
});
