/**
 * Set Primary Photo Use Case
 *
 * The previous primary is cleared in the same commit by the photo handler.
 * The doll is written with the photo so its version check covers the
 * previous primary recorded in the event.
 */

import type { UseCase } from '@dollhouse/application';
import { withStaleRetry, Result, UseCaseError } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { DollRepository, PhotoRepository } from '../../../infrastructure/persistence/index.js';
import { isDeleted, markPrimary, PhotoSetPrimary } from '../../../domain/index.js';

import type { SetPrimaryPhotoCommand } from './command.js';

export interface SetPrimaryPhotoUseCaseDeps {
	readonly dollRepository: DollRepository;
	readonly photoRepository: PhotoRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createSetPrimaryPhotoUseCase(
	deps: SetPrimaryPhotoUseCaseDeps,
): UseCase<SetPrimaryPhotoCommand, PhotoSetPrimary> {
	const { dollRepository, photoRepository, unitOfWork } = deps;

	return withStaleRetry<SetPrimaryPhotoCommand, PhotoSetPrimary>({
		async execute(command, context) {
			const photo = await photoRepository.findById(command.photoId);
			if (!photo) {
				return Result.failure(
					UseCaseError.notFound('PHOTO_NOT_FOUND', 'Photo not found', { photoId: command.photoId }),
				);
			}

			const doll = await dollRepository.findById(photo.dollId);
			if (!doll || isDeleted(doll)) {
				return Result.failure(
					UseCaseError.notFound('DOLL_NOT_FOUND', 'Doll not found', { dollId: photo.dollId }),
				);
			}

			const previous = await photoRepository.findPrimary(photo.dollId);
			const event = new PhotoSetPrimary(context, photo.dollId, {
				photo_id: photo.id,
				previous_photo_id: previous?.id ?? null,
			});

			return unitOfWork.commitAll([markPrimary(photo), doll], event, command);
		},
	});
}
