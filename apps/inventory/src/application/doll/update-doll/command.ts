/**
 * Update Doll Command
 *
 * Each field is optional; an absent field is left unchanged.
 */

import type { Command } from '@dollhouse/application';

export interface UpdateDollCommand extends Command {
	readonly dollId: string;
	readonly name?: string;
	readonly containerId?: string;
}
