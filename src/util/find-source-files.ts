import { promises as fsP } from 'fs';
import path from 'path';

import { NonFatalError } from '../errors.js';

import { hasExtension } from './resolve-path-arguments.js';

async function walk(directory: string, extension: string, found: string[]) {
	const dir = (await fsP.readdir(directory, { withFileTypes: true }))
		.filter(entry =>
			(entry.isDirectory() && !hasExtension(entry.name, extension.replace(/^\./, '-'))) ||
			(entry.isFile() && hasExtension(entry.name, extension)),
		)
		.sort((a, b) => a.name.localeCompare(b.name));

	for (const entry of dir) {
		const entryPath = path.join(directory, entry.name);
		if (entry.isFile()) {
			found.push(entryPath);
		} else {
			await walk(entryPath, extension, found);
		}
	}
}

/**
 * Returns `source` itself when it is an archive, or every archive below it when it is
 * a directory. Directories named like unpacked output (`name-dspack`) are not entered.
 */
export async function findSourceFiles(source: string, extension: string) {
	const sourceEntry = await fsP.stat(source);
	const extensionName = extension.replace(/^\./, '');

	if (sourceEntry.isFile() && hasExtension(source, extension)) return [source];
	if (!sourceEntry.isDirectory()) throw new NonFatalError('SOURCE_INVALID', { extension: extensionName });

	const found: string[] = [];
	await walk(source, extension, found);
	if (found.length === 0) throw new NonFatalError('SOURCE_INVALID', { extension: extensionName });

	return found;
}
