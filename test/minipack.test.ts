import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { decompressMiniPack, describeFailure } from '../src/dspack/minipack.js';
import type { MiniPackResult } from '../src/dspack/minipack.js';

const decoded = (result: MiniPackResult) => {
	assert.ok(result.ok, result.ok ? '' : describeFailure(result.failure));
	return result.data;
};

describe('decompressMiniPack', () => {
	it('copies literals selected by a full control byte', () => {
		const literals = [0x10, 0x20, 0x30, 0x40, 0x50, 0x60, 0x70, 0x80];
		const data = decoded(decompressMiniPack(Uint8Array.from([0xFF, ...literals]), 8));

		assert.deepEqual([...data], literals);
	});

	it('repeats a single byte through a back-reference of distance 1', () => {
		// literal 'A', then distance 1 length 3
		const data = decoded(decompressMiniPack(Uint8Array.from([0x01, 0x41, 0x01, 0x00]), 4));

		assert.equal(data.toString('latin1'), 'AAAA');
	});

	it('repeats overlapping patterns byte by byte', () => {
		// 'A' 'B', then distance 2 length 6
		const data = decoded(decompressMiniPack(Uint8Array.from([0x03, 0x41, 0x42, 0x02, 0x03]), 8));

		assert.equal(data.toString('latin1'), 'ABABABAB');
	});

	it('continues with the next control byte after eight tokens', () => {
		const input = Uint8Array.from([0xFF, ...Buffer.from('abcdefgh'), 0x01, 0x69]);

		assert.equal(decoded(decompressMiniPack(input, 9)).toString('latin1'), 'abcdefghi');
	});

	it('takes the upper four distance bits from the high nibble of the second byte', () => {
		const prefix = Array.from({ length: 300 }, (_, i) => i & 0xFF);
		const input: number[] = [];
		for (let i = 0; i < 296; i += 8) input.push(0xFF, ...prefix.slice(i, i + 8));
		// four literals, then distance 0x12C (300) length 5
		input.push(0x0F, ...prefix.slice(296), 0x2C, 0x12);

		const data = decoded(decompressMiniPack(Uint8Array.from(input), 305));

		assert.deepEqual([...data.subarray(0, 300)], prefix);
		assert.deepEqual([...data.subarray(300)], [0, 1, 2, 3, 4]);
	});

	it('stops once the output is full and ignores trailing input', () => {
		const data = decoded(decompressMiniPack(Uint8Array.from([0xFF, 0x61, 0x62, 0x63, 0x64]), 2));

		assert.equal(data.toString('latin1'), 'ab');
	});

	it('leaves the rest of the output zeroed when the input ends on a token boundary', () => {
		const data = decoded(decompressMiniPack(Uint8Array.from([0xFF, 0x41]), 4));

		assert.deepEqual([...data], [0x41, 0, 0, 0]);
	});

	it('returns an empty buffer for an empty entry', () => {
		assert.equal(decoded(decompressMiniPack(new Uint8Array(0), 0)).length, 0);
	});

	it('reports a back-reference cut off by the end of the input', () => {
		assert.deepEqual(decompressMiniPack(Uint8Array.from([0x01, 0x41, 0x01]), 4), {
			ok: false,
			failure: { kind: 'truncated-token', inputOffset: 2, outputOffset: 1 },
		});
	});

	it('reports a back-reference reaching before the start of the output', () => {
		assert.deepEqual(decompressMiniPack(Uint8Array.from([0x00, 0x01, 0x00]), 4), {
			ok: false,
			failure: { kind: 'invalid-distance', inputOffset: 1, outputOffset: 0 },
		});
	});

	it('fills zeros for a back-reference of distance 0', () => {
		const result = decompressMiniPack(Uint8Array.from([0x01, 0x41, 0x00, 0x00]), 4);

		assert.ok(result.ok);
		assert.deepEqual([...result.data], [0x41, 0, 0, 0]);
	});

	it('reports a back-reference that would write past the end of the output', () => {
		const result = decompressMiniPack(Uint8Array.from([0x01, 0x41, 0x01, 0x00]), 3);

		assert.deepEqual(result, { ok: false, failure: { kind: 'output-overrun', inputOffset: 2, outputOffset: 1 } });
		assert.ok(!result.ok);
		assert.equal(describeFailure(result.failure), 'token writes past the end of the output (input 0x2, output 0x1)');
	});

	it('decodes into a new buffer on every call', () => {
		const input = Uint8Array.from([0x01, 0x41, 0x01, 0x00]);
		const first = decoded(decompressMiniPack(input, 4));
		first.fill(0);

		assert.equal(decoded(decompressMiniPack(input, 4)).toString('latin1'), 'AAAA');
	});
});
