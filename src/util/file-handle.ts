import { promises as fsP } from 'fs';

import { ArchiveIOError, BoundsError, CustomError } from '../errors.js';

import type { ByteSource } from '../types/dspack.js';

export class ReadFile implements ByteSource {
	private closed = false;

	private constructor(
		private readonly fileHandle: fsP.FileHandle,
		readonly path: string,
		readonly size: number,
	) {}

	static async open(path: string) {
		const fileHandle = await fsP.open(path, 'r');
		try {
			return new this(fileHandle, path, (await fileHandle.stat()).size);
		} catch (err: unknown) {
			await fileHandle.close();
			throw err;
		}
	}

	async close() {
		if (!this.closed) {
			this.closed = true;
			await this.fileHandle.close();
		}
	}

	async read(offset: number, length: number) {
		if (this.closed) throw new CustomError('Read after file closed.');
		if (length === 0) return Buffer.alloc(0);
		if (offset < 0 || offset + length > this.size) {
			throw new BoundsError('READ_OUT_OF_RANGE', { length, offset, path: this.path, size: this.size });
		}

		const buffer = Buffer.allocUnsafe(length);
		const { bytesRead } = await this.fileHandle.read(buffer, 0, length, offset);
		if (bytesRead !== length) throw new ArchiveIOError('SHORT_READ', { bytesRead, length, offset, path: this.path });

		return buffer;
	}
}

export class WriteFile {
	private internalFileOffset = 0;
	private closed = false;

	private constructor(
		private readonly fileHandle: fsP.FileHandle,
		readonly path: string,
	) {}

	static async open(path: string) {
		try {
			const fileHandle = await fsP.open(path, 'w');
			return new this(fileHandle, path);
		} catch (err: unknown) {
			if (err instanceof Error) Error.captureStackTrace(err, this.open);
			throw err;
		}
	}

	async close() {
		if (!this.closed) {
			this.closed = true;
			await this.fileHandle.close();
		}
	}

	async writeBuffer(buffer: Buffer) {
		if (this.closed) throw new CustomError('Write after file closed.');
		if (buffer.length === 0) return;

		const { bytesWritten } = await this.fileHandle.write(buffer, 0, buffer.length, this.internalFileOffset);
		this.internalFileOffset += bytesWritten;
		if (bytesWritten !== buffer.length) {
			throw new ArchiveIOError('SHORT_WRITE', { bytesWritten, length: buffer.length, path: this.path });
		}
	}
}
