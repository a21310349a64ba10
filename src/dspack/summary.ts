import path from 'path';

import type { DsPackArchive } from './archive.js';
import type { FolderEntry } from '../types/dspack.js';

export const SAMPLE_FILE_COUNT = 5;

export interface FolderSummary {
	index: number;
	path: string;
	fileCount: number;
}

export interface FileSample {
	name: string;
	path: string;
	decompressedSize: number;
	compressedSize: number;
	/** Percentage saved by compression; 0 for stored or empty entries. */
	compression: number;
}

export interface ArchiveSummary {
	path: string;
	byteOrder: 'little-endian' | 'big-endian';
	numFiles: number;
	numFolders: number;
	folders: FolderSummary[];
	sampleFiles: FileSample[];
	/** Lower-cased extension without the dot, most common first. */
	extensions: [extension: string, count: number][];
}

export const folderFileCount = ({ firstFile, lastFile }: FolderEntry) => firstFile >= 0 ? Math.max(0, lastFile - firstFile + 1) : 0;

export function analyzeArchive(archive: DsPackArchive): ArchiveSummary {
	const folders = archive.folderPaths().map((folderPath, index) => ({
		index,
		path: folderPath,
		fileCount: folderFileCount(archive.folders[index]),
	}));

	const sampleFiles = archive.files.slice(0, SAMPLE_FILE_COUNT).map(file => ({
		name: file.name,
		path: archive.filePath(file),
		decompressedSize: file.decompressedSize,
		compressedSize: file.compressedSize,
		compression: file.decompressedSize > 0 ? Math.max(0, (1 - file.compressedSize / file.decompressedSize) * 100) : 0,
	}));

	const extensionCounts = new Map<string, number>();
	for (const file of archive.files) {
		const extension = path.posix.extname(file.name).slice(1).toLowerCase();
		if (extension) extensionCounts.set(extension, (extensionCounts.get(extension) ?? 0) + 1);
	}

	return {
		path: archive.path,
		byteOrder: archive.header.byteOrder === 'LE' ? 'little-endian' : 'big-endian',
		numFiles: archive.files.length,
		numFolders: archive.folders.length,
		folders,
		sampleFiles,
		extensions: [...extensionCounts].sort(([a, aCount], [b, bCount]) => bCount - aCount || a.localeCompare(b)),
	};
}

export function formatSummary(summary: ArchiveSummary, { maxFolders = Infinity } = {}) {
	const lines = [
		`[Archive Analysis: ${path.basename(summary.path)}]`,
		'='.repeat(50),
		`Format: ${summary.byteOrder}`,
		`Files: ${summary.numFiles}`,
		`Folders: ${summary.numFolders}`,
		'',
		'[Folder Structure]',
	];

	for (const folder of summary.folders.slice(0, maxFolders)) lines.push(`  ${folder.path}/ (${folder.fileCount} files)`);
	if (summary.folders.length > maxFolders) lines.push(`  ... ${summary.folders.length - maxFolders} more`);

	lines.push('', '[Sample Files]');
	for (const file of summary.sampleFiles) {
		lines.push(`  * ${file.path}`);
		lines.push(`    Size: ${file.decompressedSize.toLocaleString('en-US')} bytes`);
		if (file.compression > 0) lines.push(`    Compression: ${file.compression.toFixed(1)}%`);
	}

	if (summary.extensions.length > 0) {
		lines.push('', '[File Extensions]');
		for (const [extension, count] of summary.extensions) lines.push(`  ${extension}: ${count} files`);
	}

	return lines;
}
