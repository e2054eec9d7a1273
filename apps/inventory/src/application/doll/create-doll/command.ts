/**
 * Create Doll Command
 */

import type { Command } from '@dollhouse/application';

export interface CreateDollCommand extends Command {
	readonly name: string;
	/** Defaults to the system Home container */
	readonly containerId?: string;
	readonly purchaseUrl?: string;
}
