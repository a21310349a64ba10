import type { ByteOrder, ByteSource, FileSink } from '../../src/types/dspack.js';

export interface FixtureFile {
	name: string;
	parent: number;
	data: Buffer;
	decompressedSize?: number;
	compressedSize?: number;
	unknown?: number;
	dataOffset?: number;
}

export interface FixtureFolder {
	name: string;
	parent: number;
	firstFile?: number;
	lastFile?: number;
	firstSubfolder?: number;
	lastSubfolder?: number;
}

export interface FixtureLayout {
	namesOffset: number;
	fileDirOffset: number;
	folderDirOffset: number;
	dataOffsets: number[];
}

const HEADER_SIZE = 44;
const RECORD_SIZE = 24;
const MAGIC = {
	LE: Buffer.from([0x6D, 0x67, 0x66, 0x20, 0x08, 0x01, 0x5A, 0x5A]),
	BE: Buffer.from([0x5A, 0x5A, 0x01, 0x08, 0x20, 0x66, 0x67, 0x6D]),
};

export function writeUInt32(buffer: Buffer, offset: number, value: number, byteOrder: ByteOrder) {
	if (byteOrder === 'LE') buffer.writeUInt32LE(value >>> 0, offset);
	else buffer.writeUInt32BE(value >>> 0, offset);
}

/**
 * Lays out header, name table, file directory, folder directory and payloads in
 * that order, followed by four bytes of padding.
 */
export function buildArchive(
	{ files = [], folders = [], byteOrder = 'LE' }: { files?: FixtureFile[]; folders?: FixtureFolder[]; byteOrder?: ByteOrder },
): { buffer: Buffer; layout: FixtureLayout } {
	const nameOffsets = new Map<string, number>();
	const nameChunks: Buffer[] = [];
	let namesLength = 0;
	for (const { name } of [...files, ...folders]) {
		if (nameOffsets.has(name)) continue;
		nameOffsets.set(name, namesLength);
		const chunk = Buffer.from(`${name}\0`, 'utf8');
		nameChunks.push(chunk);
		namesLength += chunk.length;
	}

	const namesOffset = HEADER_SIZE;
	const fileDirOffset = namesOffset + namesLength;
	const folderDirOffset = fileDirOffset + files.length * RECORD_SIZE;
	let dataOffset = folderDirOffset + folders.length * RECORD_SIZE;
	const dataOffsets = files.map(file => {
		const offset = dataOffset;
		dataOffset += file.data.length;
		return offset;
	});
	const buffer = Buffer.alloc(dataOffset + 4);

	const u32 = (offset: number, value: number) => writeUInt32(buffer, offset, value, byteOrder);

	MAGIC[byteOrder].copy(buffer, 0);
	u32(12, files.length);
	u32(16, files.length * RECORD_SIZE);
	u32(20, fileDirOffset);
	u32(24, folders.length);
	u32(28, folders.length * RECORD_SIZE);
	u32(32, folderDirOffset);
	u32(36, namesLength);
	u32(40, namesOffset);

	Buffer.concat(nameChunks).copy(buffer, namesOffset);

	for (const [index, file] of files.entries()) {
		const record = fileDirOffset + index * RECORD_SIZE;
		u32(record, nameOffsets.get(file.name) ?? 0);
		u32(record + 4, file.parent);
		u32(record + 8, file.decompressedSize ?? file.data.length);
		u32(record + 12, file.compressedSize ?? file.data.length);
		u32(record + 16, file.unknown ?? 0);
		u32(record + 20, file.dataOffset ?? dataOffsets[index]);
		file.data.copy(buffer, dataOffsets[index]);
	}

	for (const [index, folder] of folders.entries()) {
		const record = folderDirOffset + index * RECORD_SIZE;
		u32(record, nameOffsets.get(folder.name) ?? 0);
		u32(record + 4, folder.parent);
		u32(record + 8, folder.lastSubfolder ?? -1);
		u32(record + 12, folder.firstSubfolder ?? -1);
		u32(record + 16, folder.firstFile ?? -1);
		u32(record + 20, folder.lastFile ?? -1);
	}

	return { buffer, layout: { namesOffset, fileDirOffset, folderDirOffset, dataOffsets } };
}

/** Directory records for the given rows of six 32-bit fields each. */
export function buildRecords(rows: number[][], byteOrder: ByteOrder = 'LE') {
	const buffer = Buffer.alloc(rows.length * RECORD_SIZE);
	for (const [row, fields] of rows.entries()) {
		for (const [column, value] of fields.entries()) writeUInt32(buffer, row * RECORD_SIZE + column * 4, value, byteOrder);
	}
	return buffer;
}

export class MemorySource implements ByteSource {
	closed = false;

	constructor(private readonly buffer: Buffer, readonly path = 'memory.dspack') {}

	get size() {
		return this.buffer.length;
	}

	async read(offset: number, length: number) {
		if (this.closed) throw new Error('Read after file closed.');
		if (offset + length > this.buffer.length) throw new Error('Read out of bounds.');
		return Buffer.from(this.buffer.subarray(offset, offset + length));
	}

	async close() {
		this.closed = true;
	}
}

export class MemorySink implements FileSink {
	readonly directories = new Set<string>();
	readonly files = new Map<string, Buffer>();

	async mkdir(segments: readonly string[]) {
		this.directories.add(segments.join('/'));
	}

	async write(segments: readonly string[], data: Buffer) {
		this.files.set(segments.join('/'), Buffer.from(data));
	}
}
