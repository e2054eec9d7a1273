export {
	PHOTO_PATH_MAX_LENGTH,
	PHOTO_EXTENSIONS,
	isPhoto,
	isSafePhotoPath,
	photoUrl,
	createPhoto,
	markPrimary,
	type Photo,
} from './photo.js';
