/**
 * Repositories
 */

export {
	createContainerRepository,
	recordToContainer,
	type ContainerRepository,
	type ReorderDirection,
} from './container-repository.js';
export {
	createDollRepository,
	recordToDoll,
	type DollRepository,
	type DollView,
	type DollSearch,
	type DollNameMatchQuery,
} from './doll-repository.js';
export { createPhotoRepository, recordToPhoto, type PhotoRepository } from './photo-repository.js';
export {
	createDollEventRepository,
	type DollEventRepository,
	type DollEventEntry,
	type DollEventFilter,
} from './doll-event-repository.js';
