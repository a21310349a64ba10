import { BoundsError, IntegrityError } from '../errors.js';

export class NameTable {
	constructor(private readonly bytes: Buffer) {}

	/** Returns the string starting at `offset`, up to (not including) its NUL terminator. */
	resolve(offset: number) {
		if (!Number.isInteger(offset) || offset < 0 || offset >= this.bytes.length) {
			throw new BoundsError('NAME_OFFSET_OUT_OF_RANGE', { offset, length: this.bytes.length });
		}

		const end = this.bytes.indexOf(0, offset);
		if (end === -1) throw new IntegrityError('NAME_UNTERMINATED', { offset });

		return this.bytes.toString('utf8', offset, end);
	}

	tryResolve(offset: number) {
		try {
			return this.resolve(offset);
		} catch (err: unknown) {
			if (err instanceof BoundsError || err instanceof IntegrityError) return undefined;
			throw err;
		}
	}
}
