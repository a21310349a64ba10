import path from 'path';

import { decompressMiniPack, describeFailure } from './minipack.js';

import type { DsPackArchive } from './archive.js';
import type { FileEntry, FileSink, LogLine } from '../types/dspack.js';

export const COMPRESSED_MARKER = '[Compressed]';

export type PayloadKind = 'empty' | 'stored' | 'minipack' | 'oversized';

export interface ExtractionFailure {
	kind: 'file' | 'folder';
	index: number;
	name: string;
	reason: string;
}

export interface ExtractionResult {
	/** False when any entry needed the raw fallback or could not be written. */
	success: boolean;
	written: string[];
	fallbacks: string[];
	skipped: number;
	failures: ExtractionFailure[];
}

export interface ExtractOptions {
	log?: LogLine;
}

interface Payload {
	data: Buffer;
	fallbackReason?: string;
}

const noop: LogLine = () => undefined;

const formatBytes = (numBytes: number) => numBytes.toLocaleString('en-US');

const errorMessage = (err: unknown) => err instanceof Error ? err.message : String(err);

export function classifyEntry({ compressedSize, decompressedSize }: FileEntry): PayloadKind {
	if (compressedSize === 0) return 'empty';
	if (compressedSize === decompressedSize) return 'stored';
	if (compressedSize < decompressedSize) return 'minipack';
	return 'oversized';
}

/** `texture.dds` becomes `texture[Compressed].dds`; names without an extension get the marker appended. */
export function insertMarker(name: string, marker = COMPRESSED_MARKER) {
	const extension = path.posix.extname(name);
	return `${name.slice(0, name.length - extension.length)}${marker}${extension}`;
}

function decodePayload(file: FileEntry, raw: Buffer): Payload {
	switch (classifyEntry(file)) {
		case 'minipack': {
			const result = decompressMiniPack(raw, file.decompressedSize);
			if (result.ok) return { data: result.data };
			return { data: raw, fallbackReason: `Unknown compression format, ${describeFailure(result.failure)}` };
		}

		case 'oversized':
			return {
				data: raw,
				fallbackReason: `Invalid compression, compressed size ${formatBytes(file.compressedSize)} exceeds decompressed size ${formatBytes(file.decompressedSize)}`,
			};

		default: return { data: raw };
	}
}

/**
 * Materialises every folder and file of `archive` in `sink`, in directory order.
 *
 * A file that cannot be decoded is written as its raw stored bytes under a
 * marked name; a file that cannot be read or written is recorded and skipped.
 * Neither stops the remaining files.
 */
export async function extractArchive(archive: DsPackArchive, sink: FileSink, { log = noop }: ExtractOptions = {}): Promise<ExtractionResult> {
	const folderPaths = archive.folderPaths();
	const result: ExtractionResult = {
		success: true,
		written: [],
		fallbacks: [],
		skipped: 0,
		failures: [],
	};

	for (const [index, folderPath] of folderPaths.entries()) {
		try {
			await sink.mkdir(folderPath.split('/'));
		} catch (err: unknown) {
			const reason = errorMessage(err);
			log(`(!!) Could not create folder ${folderPath}: ${reason}`);
			result.failures.push({ kind: 'folder', index, name: folderPath, reason });
		}
	}

	const total = archive.files.length;
	for (const [index, file] of archive.files.entries()) {
		const directory = file.parentFolder === -1 ? [] : folderPaths[file.parentFolder].split('/');
		log(`[${index + 1}/${total}] ${[...directory, file.name].join('/')}`);

		if (classifyEntry(file) === 'empty') {
			log('  - No payload, skipped');
			result.skipped++;
			continue;
		}

		try {
			const payload = decodePayload(file, await archive.readPayload(file));
			const name = payload.fallbackReason === undefined ? file.name : insertMarker(file.name);
			const segments = [...directory, name];

			await sink.write(segments, payload.data);

			const writtenPath = segments.join('/');
			result.written.push(writtenPath);

			if (payload.fallbackReason !== undefined) {
				log(`(!!) ${payload.fallbackReason}; extracted as-is to ${writtenPath}`);
				result.fallbacks.push(writtenPath);
			} else if (classifyEntry(file) === 'stored') {
				log('  > File is not compressed');
			} else {
				log(`  > Decompressed (${formatBytes(file.compressedSize)} -> ${formatBytes(payload.data.length)} bytes)`);
			}
		} catch (err: unknown) {
			const reason = errorMessage(err);
			log(`(!!) Failed to extract ${file.name}: ${reason}`);
			result.failures.push({ kind: 'file', index, name: file.name, reason });
		}
	}

	result.success = result.fallbacks.length === 0 && result.failures.length === 0;
	log(`Extracted ${result.written.length} of ${total} files (${result.fallbacks.length} as-is, ${result.skipped} empty, ${result.failures.length} failed)`);

	return result;
}
