export {
	SystemContainers,
	CONTAINER_NAME_MAX_LENGTH,
	SORT_ORDER_STEP,
	isContainer,
	createContainer,
	nextSortOrder,
	renameContainer,
	setContainerActive,
	swapSortOrder,
	type Container,
	type SystemContainerName,
} from './container.js';
export {
	ContainerCreated,
	ContainerUpdated,
	ContainerReordered,
	ContainerDeleted,
	type ContainerCreatedData,
	type ContainerUpdatedData,
	type ContainerReorderedData,
	type ContainerDeletedData,
} from './events.js';
