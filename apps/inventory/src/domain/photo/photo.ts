/**
 * Photo Entity
 *
 * A photo record points at a file the media layer has already stored. Only
 * the relative path is kept; the public URL is built from the media base path.
 */

import { generate, isTypedId } from '@dollhouse/tsid';
import type { Aggregate } from '@dollhouse/domain-core';

export interface Photo {
	readonly id: string;
	readonly dollId: string;
	/** Path relative to the media root, e.g. `dolls/ann/front.jpg` */
	readonly path: string;
	readonly isPrimary: boolean;
	readonly createdAt: Date;
	readonly createdBy: string;
}

export const PHOTO_PATH_MAX_LENGTH = 500;

export const PHOTO_EXTENSIONS = ['jpg', 'jpeg', 'png', 'webp', 'gif'] as const;

// Segments may not start with a dot, which also rules out `.` and `..`.
const SEGMENT = '[A-Za-z0-9_-][A-Za-z0-9._-]*';
const PHOTO_PATH = new RegExp(`^(?:${SEGMENT}/)*${SEGMENT}\\.(?:${PHOTO_EXTENSIONS.join('|')})$`, 'i');

export function isPhoto(aggregate: Aggregate): aggregate is Photo {
	return isTypedId('PHOTO', aggregate.id);
}

/**
 * A relative path of plain segments ending in an image extension.
 */
export function isSafePhotoPath(path: string): boolean {
	return path.length > 0 && path.length <= PHOTO_PATH_MAX_LENGTH && PHOTO_PATH.test(path);
}

export function photoUrl(mediaBasePath: string, path: string): string {
	return `${mediaBasePath}/${path}`;
}

export function createPhoto(params: {
	dollId: string;
	path: string;
	isPrimary: boolean;
	createdBy: string;
	now?: Date;
}): Photo {
	return {
		id: generate('PHOTO'),
		dollId: params.dollId,
		path: params.path,
		isPrimary: params.isPrimary,
		createdAt: params.now ?? new Date(),
		createdBy: params.createdBy,
	};
}

export function markPrimary(photo: Photo): Photo {
	return { ...photo, isPrimary: true };
}
