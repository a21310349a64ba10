/*
 * MiniPack stream: a sequence of segments, each a control byte followed by up to
 * eight tokens. Control bits are consumed from bit 0 upwards.
 *
 * bit = 1 | literal        | 1 byte, copied verbatim
 * bit = 0 | back-reference | 2 bytes b0 b1
 *         |                | distance = (b1 & 0xF0) << 4 | b0   (0..4095)
 *         |                | length   = (b1 & 0x0F) + 3         (3..18)
 *
 * Back-references copy one byte at a time so that distance < length repeats the
 * most recent bytes. Distance 0 copies the not yet written (zero) byte under the
 * output position, which yields a run of zeros.
 */

export type DecompressionFailureKind =
	| 'truncated-token'
	| 'output-overrun'
	| 'invalid-distance';

export interface DecompressionFailure {
	kind: DecompressionFailureKind;
	inputOffset: number;
	outputOffset: number;
}

export type MiniPackResult =
	| { ok: true; data: Buffer }
	| { ok: false; failure: DecompressionFailure };

const describe: Record<DecompressionFailureKind, string> = {
	'truncated-token': 'input ends inside a back-reference',
	'output-overrun': 'token writes past the end of the output',
	'invalid-distance': 'back-reference points before the start of the output',
};

export function describeFailure({ kind, inputOffset, outputOffset }: DecompressionFailure) {
	return `${describe[kind]} (input 0x${inputOffset.toString(16)}, output 0x${outputOffset.toString(16)})`;
}

/**
 * Decodes `input` into a fresh buffer of exactly `decompressedSize` bytes.
 *
 * Decoding stops once the output is full, ignoring any trailing input. Input that
 * runs out on a token boundary before then leaves the rest of the output zeroed.
 */
export function decompressMiniPack(input: Uint8Array, decompressedSize: number): MiniPackResult {
	const output = Buffer.alloc(decompressedSize);
	let inputOffset = 0;
	let outputOffset = 0;

	const fail = (kind: DecompressionFailureKind): MiniPackResult => ({ ok: false, failure: { kind, inputOffset, outputOffset } });

	while (inputOffset < input.length && outputOffset < decompressedSize) {
		const control = input[inputOffset++];

		for (let bit = 0; bit < 8; bit++) {
			if (inputOffset >= input.length) break;

			if ((control & (1 << bit)) !== 0) {
				output[outputOffset++] = input[inputOffset++];
			} else {
				if (inputOffset + 1 >= input.length) return fail('truncated-token');

				const b0 = input[inputOffset];
				const b1 = input[inputOffset + 1];
				const distance = ((b1 & 0xF0) << 4) | b0;
				const length = (b1 & 0x0F) + 3;

				if (distance > outputOffset) return fail('invalid-distance');
				if (outputOffset + length > decompressedSize) return fail('output-overrun');

				for (let i = 0; i < length; i++) {
					output[outputOffset] = output[outputOffset - distance];
					outputOffset++;
				}
				inputOffset += 2;
			}

			if (outputOffset >= decompressedSize) break;
		}
	}

	return { ok: true, data: output };
}
