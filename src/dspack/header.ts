import { BoundsError, FormatError, IntegrityError } from '../errors.js';

import { BinaryCursor } from '../util/binary-cursor.js';

import type { ByteOrder, Header } from '../types/dspack.js';

export const HEADER_SIZE = 44;
export const RECORD_SIZE = 24;
export const MAX_ENTRY_COUNT = 100_000;

const MAGIC_LE = Buffer.from([0x6D, 0x67, 0x66, 0x20, 0x08, 0x01, 0x5A, 0x5A]); // "mgf " 08 01 5A 5A
const MAGIC_BE = Buffer.from([...MAGIC_LE].reverse()); // " fgm" 5A 5A 01 08

/**
 * Only the two exact 8-byte patterns are accepted; the big-endian form is the
 * little-endian one reversed byte for byte.
 */
export function detectByteOrder(magic: Buffer): ByteOrder | undefined {
	if (magic.length < MAGIC_LE.length) return undefined;

	const candidate = magic.subarray(0, MAGIC_LE.length);
	if (candidate.equals(MAGIC_LE)) return 'LE';
	if (candidate.equals(MAGIC_BE)) return 'BE';
	return undefined;
}

/**
 * Parses the fixed header. `buffer` holds the first bytes of the archive (at most
 * {@link HEADER_SIZE} are looked at) and `fileSize` is the size of the whole archive.
 */
export function parseHeader(buffer: Buffer, fileSize: number, path: string): Header {
	const byteOrder = detectByteOrder(buffer);
	if (!byteOrder) {
		throw new FormatError('MAGIC_INVALID', { path, magic: buffer.subarray(0, 8).toString('hex') || '(empty)' });
	}
	if (buffer.length < HEADER_SIZE || fileSize < HEADER_SIZE) {
		throw new BoundsError('HEADER_TRUNCATED', { path, size: fileSize, headerSize: HEADER_SIZE });
	}

	const cursor = new BinaryCursor(buffer);
	cursor.skip(MAGIC_LE.length + 4); // magic, reserved

	const count = (field: string) => {
		const value = cursor.readUInt32(byteOrder);
		if (value > MAX_ENTRY_COUNT) throw new IntegrityError('COUNT_TOO_LARGE', { field, value, limit: MAX_ENTRY_COUNT });
		return value;
	};
	const offset = (field: string) => {
		const value = cursor.readUInt32(byteOrder);
		if (value >= fileSize) throw new BoundsError('OFFSET_OUT_OF_RANGE', { field, value, size: fileSize });
		return value;
	};
	const length = () => cursor.readUInt32(byteOrder);

	const header: Header = {
		byteOrder,
		numFiles: count('num_files'),
		fileDirLength: length(),
		fileDirOffset: offset('file_dir_offset'),
		numFolders: count('num_folders'),
		folderDirLength: length(),
		folderDirOffset: offset('folder_dir_offset'),
		namesDirLength: length(),
		namesDirOffset: offset('names_dir_offset'),
	};

	checkRegion('file directory', header.fileDirOffset, header.numFiles * RECORD_SIZE, fileSize);
	checkRegion('folder directory', header.folderDirOffset, header.numFolders * RECORD_SIZE, fileSize);
	checkRegion('name table', header.namesDirOffset, header.namesDirLength, fileSize);

	return header;
}

function checkRegion(region: string, start: number, size: number, fileSize: number) {
	const end = start + size;
	if (end > fileSize) throw new BoundsError('REGION_OUT_OF_RANGE', { region, start, end, size: fileSize });
}
