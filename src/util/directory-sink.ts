import path from 'path';

import { ArchiveIOError } from '../errors.js';

import { WriteFile } from './file-handle.js';
import { mkdirIfDoesNotExist } from './mkdir-if-does-not-exist.js';

import type { FileSink } from '../types/dspack.js';

/** Writes extracted entries below a directory on disk. */
export class DirectorySink implements FileSink {
	readonly root: string;

	constructor(root: string) {
		this.root = path.resolve(root);
	}

	async mkdir(segments: readonly string[]) {
		await mkdirIfDoesNotExist(this.resolve(segments));
	}

	async write(segments: readonly string[], data: Buffer) {
		const destinationPath = this.resolve(segments);
		await mkdirIfDoesNotExist(path.dirname(destinationPath));

		const writeFile = await WriteFile.open(destinationPath);
		try {
			await writeFile.writeBuffer(data);
		} finally {
			await writeFile.close();
		}
	}

	private resolve(segments: readonly string[]) {
		const destinationPath = path.resolve(this.root, ...segments);
		const relativePath = path.relative(this.root, destinationPath);

		if (relativePath === '..' || relativePath.startsWith(`..${path.sep}`) || path.isAbsolute(relativePath)) {
			throw new ArchiveIOError('PATH_ESCAPES_ROOT', { path: segments.join('/') });
		}

		return destinationPath;
	}
}
