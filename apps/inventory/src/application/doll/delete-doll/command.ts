/**
 * Delete Doll Command
 */

import type { DeleteCommand } from '@dollhouse/application';

export type DeleteDollCommand = DeleteCommand<'dollId'>;
