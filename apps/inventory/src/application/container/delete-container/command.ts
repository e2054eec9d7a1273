/**
 * Delete Container Command
 */

import type { DeleteCommand } from '@dollhouse/application';

export type DeleteContainerCommand = DeleteCommand<'containerId'>;
