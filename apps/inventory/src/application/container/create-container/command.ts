/**
 * Create Container Command
 */

import type { Command } from '@dollhouse/application';

export interface CreateContainerCommand extends Command {
	readonly name: string;
}
