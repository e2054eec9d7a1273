export {
	DOLL_NAME_MAX_LENGTH,
	isDoll,
	createDoll,
	isDeleted,
	renameDoll,
	moveDoll,
	softDeleteDoll,
	isHttpUrl,
	type Doll,
} from './doll.js';
export { deriveLocation, type LegacyLocation, type LegacyLocationKind } from './location.js';
export {
	DollCreated,
	DollRenamed,
	DollMoved,
	DollDeleted,
	PhotoAdded,
	PhotoSetPrimary,
	DOLL_EVENT_TYPES,
	isDollEventType,
	type DollEvent,
	type DollEventType,
	type DollCreatedData,
	type DollRenamedData,
	type DollMovedData,
	type DollDeletedData,
	type PhotoAddedData,
	type PhotoSetPrimaryData,
} from './events.js';
export {
	DollEventPayloads,
	DollEventBodySchema,
	readEventBody,
	describeEvent,
	summarizeEvent,
	type DollEventBody,
} from './event-log.js';
export { SUGGESTION_CANDIDATES, rankSuggestions } from './suggestions.js';
