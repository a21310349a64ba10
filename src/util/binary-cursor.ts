import { BoundsError } from '../errors.js';

import type { ByteOrder } from '../types/dspack.js';

export class BinaryCursor {
	private internalOffset = 0;

	constructor(private readonly buffer: Buffer) {}

	skip(numBytes: number) {
		this.take(numBytes);
	}

	////////////////
	// READ METHODS

	readUInt32(byteOrder: ByteOrder) {
		const start = this.take(4);
		return byteOrder === 'LE' ? this.buffer.readUInt32LE(start) : this.buffer.readUInt32BE(start);
	}
	readInt32(byteOrder: ByteOrder) {
		const start = this.take(4);
		return byteOrder === 'LE' ? this.buffer.readInt32LE(start) : this.buffer.readInt32BE(start);
	}

	private take(numBytes: number) {
		const start = this.internalOffset;
		if (numBytes < 0 || start + numBytes > this.buffer.length) this.outOfRange(start, numBytes);
		this.internalOffset += numBytes;
		return start;
	}

	private outOfRange(position: number, length: number): never {
		throw new BoundsError('CURSOR_OUT_OF_RANGE', { position, length, size: this.buffer.length });
	}
}
