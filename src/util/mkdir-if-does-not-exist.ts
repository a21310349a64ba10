import fs, { promises as fsP } from 'fs';

import { ArchiveIOError, NonFatalError } from '../errors.js';

export async function mkdirIfDoesNotExist(destinationPath: string) {
	const exists = await fsP.access(destinationPath, fs.constants.F_OK).then(() => true, () => false);

	if (!exists) {
		// Parents of archive folders are not guaranteed to exist yet; always recurse
		await fsP.mkdir(destinationPath, { recursive: true });
		return;
	}

	if (!(await fsP.stat(destinationPath)).isDirectory()) throw new ArchiveIOError('NOT_A_DIRECTORY', { path: destinationPath });

	await fsP.access(destinationPath, fs.constants.W_OK).catch(() => {
		throw new NonFatalError('NO_WRITE_PERMISSIONS_PATH', { path: destinationPath });
	});
}
