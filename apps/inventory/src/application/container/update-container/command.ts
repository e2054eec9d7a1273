/**
 * Update Container Command
 */

import type { Command } from '@dollhouse/application';

export interface UpdateContainerCommand extends Command {
	readonly containerId: string;
	readonly name?: string;
	readonly isActive?: boolean;
}
