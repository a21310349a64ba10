import { CorruptArchiveError, IntegrityError } from '../errors.js';

import type { FolderEntry } from '../types/dspack.js';

/**
 * Turns the folder directory's parent links into slash-joined paths.
 *
 * Every folder's path is computed at most once. Parent links are unchecked
 * pointers into the same table, so a walk that meets a folder still on its own
 * chain throws {@link CorruptArchiveError} instead of looping.
 */
export class FolderPathResolver {
	private readonly paths: (string | undefined)[];
	private internalComputedCount = 0;

	constructor(private readonly folders: readonly FolderEntry[]) {
		this.paths = new Array<string | undefined>(folders.length).fill(undefined);
	}

	/** Number of folder paths built so far; never exceeds the folder count. */
	get computedCount() {
		return this.internalComputedCount;
	}

	resolve(index: number): string {
		const cached = this.cachedPath(index);
		if (cached !== undefined) return cached;

		// Walk up until a root or an already resolved ancestor, then build back down.
		const chain: number[] = [];
		const onChain = new Set<number>();
		let current = index;
		let base: string | undefined;

		while (true) {
			if (onChain.has(current)) {
				throw new CorruptArchiveError('FOLDER_CYCLE', { index: current, chain: [...chain, current].join(' -> ') });
			}

			chain.push(current);
			onChain.add(current);

			const { parentFolder } = this.folderAt(current);
			if (parentFolder === -1) break;

			base = this.cachedPath(parentFolder);
			if (base !== undefined) break;

			current = parentFolder;
		}

		for (let i = chain.length - 1; i >= 0; i--) {
			const folderIndex = chain[i];
			const { name } = this.folderAt(folderIndex);
			base = base === undefined ? name : `${base}/${name}`;
			this.paths[folderIndex] = base;
			this.internalComputedCount++;
		}

		return this.resolve(index);
	}

	resolveAll() {
		return this.folders.map((_, index) => this.resolve(index));
	}

	private cachedPath(index: number) {
		this.folderAt(index);
		return this.paths[index];
	}

	private folderAt(index: number) {
		const folder = this.folders[index];
		if (!Number.isInteger(index) || !folder) {
			throw new IntegrityError('FOLDER_INDEX_INVALID', { index, count: this.folders.length });
		}
		return folder;
	}
}
