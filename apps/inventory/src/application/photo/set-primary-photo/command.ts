/**
 * Set Primary Photo Command
 */

import type { Command } from '@dollhouse/application';

export interface SetPrimaryPhotoCommand extends Command {
	readonly photoId: string;
}
