import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { BoundsError, IntegrityError } from '../src/errors.js';
import { NameTable } from '../src/dspack/name-table.js';

describe('NameTable', () => {
	// 20 bytes: 'é' takes two
	const names = new NameTable(Buffer.from('Data\0Textures\0Café\0', 'utf8'));

	it('returns the bytes up to the NUL terminator', () => {
		assert.equal(names.resolve(0), 'Data');
		assert.equal(names.resolve(5), 'Textures');
		assert.equal(names.resolve(7), 'xtures');
		assert.equal(names.resolve(14), 'Café');
	});

	it('returns an empty string for an offset that points at a terminator', () => {
		assert.equal(names.resolve(4), '');
	});

	it('fails for offsets at or after the end of the table', () => {
		assert.throws(() => names.resolve(20), BoundsError);
		assert.throws(() => names.resolve(31), BoundsError);
		assert.throws(() => names.resolve(-1), BoundsError);
		assert.throws(
			() => names.resolve(100),
			{ message: 'Name offset 100 lies outside the name table (20 bytes).' },
		);
	});

	it('fails when no terminator follows the offset', () => {
		const unterminated = new NameTable(Buffer.from('Data\0Tex', 'utf8'));

		assert.equal(unterminated.resolve(0), 'Data');
		assert.throws(
			() => unterminated.resolve(5),
			(err: unknown) => err instanceof IntegrityError && err.message === 'Name at offset 5 has no NUL terminator before the end of the name table.',
		);
	});

	it('reports failures as undefined from tryResolve', () => {
		assert.equal(names.tryResolve(0), 'Data');
		assert.equal(names.tryResolve(20), undefined);
		assert.equal(new NameTable(Buffer.from('abc')).tryResolve(0), undefined);
	});
});
