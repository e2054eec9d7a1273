/**
 * Add Photo Use Case
 *
 * Records a photo for a doll. The first photo of a doll becomes primary, as
 * does any photo added with `makePrimary`. The doll is committed alongside
 * so that a concurrent photo change sends this one back for a fresh count.
 */

import type { UseCase } from '@dollhouse/application';
import { withStaleRetry, Result, UseCaseError, ExecutionContext } from '@dollhouse/application';
import type { UnitOfWork } from '@dollhouse/domain-core';

import type { DollRepository, PhotoRepository } from '../../../infrastructure/persistence/index.js';
import { createPhoto, isDeleted, isSafePhotoPath, PhotoAdded, PHOTO_EXTENSIONS } from '../../../domain/index.js';

import type { AddPhotoCommand } from './command.js';

export interface AddPhotoUseCaseDeps {
	readonly dollRepository: DollRepository;
	readonly photoRepository: PhotoRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createAddPhotoUseCase(deps: AddPhotoUseCaseDeps): UseCase<AddPhotoCommand, PhotoAdded> {
	const { dollRepository, photoRepository, unitOfWork } = deps;

	return withStaleRetry<AddPhotoCommand, PhotoAdded>({
		async execute(command, context) {
			const path = command.path.trim();
			if (!isSafePhotoPath(path)) {
				return Result.failure(
					UseCaseError.validation(
						'INVALID_PHOTO_PATH',
						`Photo path must be a relative path ending in ${PHOTO_EXTENSIONS.join(', ')}`,
						{ field: 'path' },
					),
				);
			}

			const doll = await dollRepository.findById(command.dollId);
			if (!doll || isDeleted(doll)) {
				return Result.failure(
					UseCaseError.notFound('DOLL_NOT_FOUND', 'Doll not found', { dollId: command.dollId }),
				);
			}

			const existing = await photoRepository.countByDoll(doll.id);
			const photo = createPhoto({
				dollId: doll.id,
				path,
				isPrimary: existing === 0 || command.makePrimary === true,
				createdBy: ExecutionContext.principalId(context),
			});

			const event = new PhotoAdded(context, doll.id, { photo_id: photo.id, is_primary: photo.isPrimary });

			return unitOfWork.commitAll([photo, doll], event, command);
		},
	});
}
