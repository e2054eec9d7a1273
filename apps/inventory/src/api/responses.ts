/**
 * Response mapping
 *
 * Domain objects to the snake_case JSON the API serves.
 */

import { deriveLocation, photoUrl, summarizeEvent, type Container, type Photo } from '../domain/index.js';
import type { DollEventEntry, DollView } from '../infrastructure/persistence/index.js';

export interface ContainerResponse {
	id: string;
	name: string;
	sort_order: number;
	is_active: boolean;
	is_system: boolean;
	created_at: string;
	updated_at: string;
}

export interface DollResponse {
	id: string;
	name: string;
	container_id: string;
	container_name: string;
	location: 'HOME' | 'BAG' | null;
	bag_number: number | null;
	purchase_url: string | null;
	primary_photo_url: string | null;
	created_at: string;
	updated_at: string;
	deleted_at: string | null;
}

export interface DollDetailResponse extends DollResponse {
	photos_count: number;
}

export interface SuggestionResponse {
	id: string;
	name: string;
	container_id: string;
	container_name: string;
	location: 'HOME' | 'BAG' | null;
	bag_number: number | null;
	primary_photo_url: string | null;
}

export interface PhotoResponse {
	id: string;
	doll_id: string;
	url: string;
	is_primary: boolean;
	created_at: string;
	created_by: string;
}

export interface EventResponse {
	id: string;
	doll_id: string;
	event_type: string;
	payload: unknown;
	summary: string;
	created_by: string;
	created_at: string;
}

export function toContainerResponse(container: Container): ContainerResponse {
	return {
		id: container.id,
		name: container.name,
		sort_order: container.sortOrder,
		is_active: container.isActive,
		is_system: container.isSystem,
		created_at: container.createdAt.toISOString(),
		updated_at: container.updatedAt.toISOString(),
	};
}

export function toDollResponse(view: DollView, mediaBasePath: string): DollResponse {
	const { doll, container } = view;
	const legacy = deriveLocation(container);
	return {
		id: doll.id,
		name: doll.name,
		container_id: container.id,
		container_name: container.name,
		location: legacy.location,
		bag_number: legacy.bagNumber,
		purchase_url: doll.purchaseUrl,
		primary_photo_url: view.primaryPhotoPath ? photoUrl(mediaBasePath, view.primaryPhotoPath) : null,
		created_at: doll.createdAt.toISOString(),
		updated_at: doll.updatedAt.toISOString(),
		deleted_at: doll.deletedAt?.toISOString() ?? null,
	};
}

export function toDollDetailResponse(view: DollView, photosCount: number, mediaBasePath: string): DollDetailResponse {
	return { ...toDollResponse(view, mediaBasePath), photos_count: photosCount };
}

export function toSuggestionResponse(view: DollView, mediaBasePath: string): SuggestionResponse {
	const legacy = deriveLocation(view.container);
	return {
		id: view.doll.id,
		name: view.doll.name,
		container_id: view.container.id,
		container_name: view.container.name,
		location: legacy.location,
		bag_number: legacy.bagNumber,
		primary_photo_url: view.primaryPhotoPath ? photoUrl(mediaBasePath, view.primaryPhotoPath) : null,
	};
}

export function toPhotoResponse(photo: Photo, mediaBasePath: string): PhotoResponse {
	return {
		id: photo.id,
		doll_id: photo.dollId,
		url: photoUrl(mediaBasePath, photo.path),
		is_primary: photo.isPrimary,
		created_at: photo.createdAt.toISOString(),
		created_by: photo.createdBy,
	};
}

export function toEventResponse(entry: DollEventEntry): EventResponse {
	return {
		id: entry.id,
		doll_id: entry.dollId,
		event_type: entry.eventType,
		payload: entry.payload,
		summary: summarizeEvent(entry.eventType, entry.payload),
		created_by: entry.createdBy,
		created_at: entry.createdAt.toISOString(),
	};
}
