import { BoundsError, IntegrityError } from '../errors.js';

import { BinaryCursor } from '../util/binary-cursor.js';

import type { NameTable } from './name-table.js';
import type { ByteOrder, FileEntry, FolderEntry } from '../types/dspack.js';

interface DirectoryContext {
	byteOrder: ByteOrder;
	numFiles: number;
	numFolders: number;
	names: NameTable;
	/** Size of the whole archive; every payload must lie inside it. */
	fileSize: number;
}

const isParentValid = (parent: number, numFolders: number) => parent === -1 || (parent >= 0 && parent < numFolders);
const isFileIndexValid = (index: number, numFiles: number) => index >= -1 && index <= numFiles;

function readName(context: DirectoryContext, kind: 'file' | 'folder', index: number, offset: number) {
	const name = context.names.tryResolve(offset);
	if (!name) throw new IntegrityError('NAME_UNRESOLVED', { offset, kind, index });
	return name;
}

/** Reads `numFiles` 24-byte records from `records`, which starts at the file directory. */
export function readFileEntries(records: Buffer, context: DirectoryContext): FileEntry[] {
	const { byteOrder } = context;
	const cursor = new BinaryCursor(records);
	const files: FileEntry[] = [];

	for (let index = 0; index < context.numFiles; index++) {
		const nameOffset = cursor.readUInt32(byteOrder);
		const parentFolder = cursor.readInt32(byteOrder);
		const decompressedSize = cursor.readUInt32(byteOrder);
		const compressedSize = cursor.readUInt32(byteOrder);
		const unknown = cursor.readUInt32(byteOrder);
		const dataOffset = cursor.readUInt32(byteOrder);

		if (!isParentValid(parentFolder, context.numFolders)) {
			throw new IntegrityError('PARENT_INVALID', { parent: parentFolder, kind: 'file', index });
		}
		if (dataOffset >= context.fileSize) {
			throw new BoundsError('DATA_OFFSET_OUT_OF_RANGE', { offset: dataOffset, index, size: context.fileSize });
		}
		if (dataOffset + compressedSize > context.fileSize) {
			throw new BoundsError('DATA_OUT_OF_RANGE', { index, start: dataOffset, end: dataOffset + compressedSize, size: context.fileSize });
		}

		files.push({
			name: readName(context, 'file', index, nameOffset),
			parentFolder,
			decompressedSize,
			compressedSize,
			unknown,
			dataOffset,
		});
	}

	return files;
}

/** Reads `numFolders` 24-byte records from `records`, which starts at the folder directory. */
export function readFolderEntries(records: Buffer, context: DirectoryContext): FolderEntry[] {
	const { byteOrder } = context;
	const cursor = new BinaryCursor(records);
	const folders: FolderEntry[] = [];

	for (let index = 0; index < context.numFolders; index++) {
		const nameOffset = cursor.readUInt32(byteOrder);
		const parentFolder = cursor.readInt32(byteOrder);
		const lastSubfolder = cursor.readInt32(byteOrder);
		const firstSubfolder = cursor.readInt32(byteOrder);
		const firstFile = cursor.readInt32(byteOrder);
		const lastFile = cursor.readInt32(byteOrder);

		if (!isParentValid(parentFolder, context.numFolders)) {
			throw new IntegrityError('PARENT_INVALID', { parent: parentFolder, kind: 'folder', index });
		}
		if (!isFileIndexValid(firstFile, context.numFiles)) {
			throw new IntegrityError('FILE_RANGE_INVALID', { field: 'first file', value: firstFile, index });
		}
		if (!isFileIndexValid(lastFile, context.numFiles)) {
			throw new IntegrityError('FILE_RANGE_INVALID', { field: 'last file', value: lastFile, index });
		}

		folders.push({
			name: readName(context, 'folder', index, nameOffset),
			parentFolder,
			lastSubfolder,
			firstSubfolder,
			firstFile,
			lastFile,
		});
	}

	return folders;
}
