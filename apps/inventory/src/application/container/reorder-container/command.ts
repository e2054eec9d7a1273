/**
 * Reorder Container Command
 */

import type { Command } from '@dollhouse/application';
import type { ReorderDirection } from '../../../infrastructure/persistence/index.js';

export interface ReorderContainerCommand extends Command {
	readonly containerId: string;
	readonly direction: ReorderDirection;
}
