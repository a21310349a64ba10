import { ArchiveIOError } from '../errors.js';

import { DirectorySink } from '../util/directory-sink.js';
import { ReadFile } from '../util/file-handle.js';

import { HEADER_SIZE, RECORD_SIZE, parseHeader } from './header.js';
import { NameTable } from './name-table.js';
import { readFileEntries, readFolderEntries } from './directory.js';
import { FolderPathResolver } from './path-resolver.js';
import { analyzeArchive } from './summary.js';
import { extractArchive } from './extract.js';
import type { ExtractOptions } from './extract.js';

import type { ByteSource, FileEntry, FolderEntry, Header } from '../types/dspack.js';

/**
 * An open dsPack archive. The header, name table and both directories are read
 * up front; file payloads are read from the source on demand.
 */
export class DsPackArchive {
	private readonly resolver: FolderPathResolver;
	private closed = false;

	private constructor(
		private readonly source: ByteSource,
		readonly header: Header,
		readonly names: NameTable,
		readonly files: readonly FileEntry[],
		readonly folders: readonly FolderEntry[],
	) {
		this.resolver = new FolderPathResolver(folders);
	}

	get path() {
		return this.source.path;
	}

	get size() {
		return this.source.size;
	}

	/** Parses the directory structures of `source`. The source is closed if parsing fails. */
	static async load(source: ByteSource) {
		try {
			const header = parseHeader(
				await source.read(0, Math.min(HEADER_SIZE, source.size)),
				source.size,
				source.path,
			);
			const names = new NameTable(await source.read(header.namesDirOffset, header.namesDirLength));
			const context = {
				byteOrder: header.byteOrder,
				numFiles: header.numFiles,
				numFolders: header.numFolders,
				names,
				fileSize: source.size,
			};

			const files = readFileEntries(await source.read(header.fileDirOffset, header.numFiles * RECORD_SIZE), context);
			const folders = readFolderEntries(await source.read(header.folderDirOffset, header.numFolders * RECORD_SIZE), context);

			return new this(source, header, names, files, folders);
		} catch (err: unknown) {
			await source.close();
			throw err;
		}
	}

	async close() {
		if (!this.closed) {
			this.closed = true;
			await this.source.close();
		}
	}

	/** Full slash-joined path of a folder, memoized for the life of the archive. */
	folderPath(index: number) {
		return this.resolver.resolve(index);
	}

	folderPaths() {
		return this.resolver.resolveAll();
	}

	/** Slash-joined path of a file, relative to the archive root. */
	filePath(file: FileEntry) {
		return file.parentFolder === -1 ? file.name : `${this.folderPath(file.parentFolder)}/${file.name}`;
	}

	/** Read-only overview of the archive; touches no payloads. */
	analyze() {
		return analyzeArchive(this);
	}

	extractAll(outputRoot: string, options?: ExtractOptions) {
		return extractArchive(this, new DirectorySink(outputRoot), options);
	}

	async readPayload(file: FileEntry) {
		if (this.closed) throw new ArchiveIOError('ARCHIVE_CLOSED', { path: this.path });

		// ranges were checked against the file size by readFileEntries
		return this.source.read(file.dataOffset, file.compressedSize);
	}
}

export async function openArchive(path: string) {
	return DsPackArchive.load(await ReadFile.open(path));
}

/** Opens the archive at `path` for the duration of `action`, closing it on every exit path. */
export async function withArchive<T>(path: string, action: (archive: DsPackArchive) => Promise<T>) {
	const archive = await openArchive(path);
	try {
		return await action(archive);
	} finally {
		await archive.close();
	}
}
