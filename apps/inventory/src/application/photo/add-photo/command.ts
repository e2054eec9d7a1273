/**
 * Add Photo Command
 *
 * The file is already stored by the media layer; `path` is its location
 * relative to the media root.
 */

import type { Command } from '@dollhouse/application';

export interface AddPhotoCommand extends Command {
	readonly dollId: string;
	readonly path: string;
	readonly makePrimary?: boolean;
}
