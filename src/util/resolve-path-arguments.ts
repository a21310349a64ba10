import fs, { promises as fsP } from 'fs';
import path from 'path';

import { NonFatalError } from '../errors.js';

async function checkPath(pathArg: string, type: 'source' | 'destination') {
	await fsP.access(pathArg, fs.constants.F_OK).catch(() => {
		throw new NonFatalError('PATH_DOES_NOT_EXIST', { type });
	});

	if (type === 'source') {
		await fsP.access(pathArg, fs.constants.R_OK).catch(() => {
			throw new NonFatalError('NO_READ_PERMISSIONS_TYPE', { type });
		});
	} else {
		if (!(await fsP.stat(pathArg)).isDirectory()) throw new NonFatalError('DESTINATION_INVALID');

		await fsP.access(pathArg, fs.constants.W_OK).catch(() => {
			throw new NonFatalError('NO_WRITE_PERMISSIONS_TYPE', { type });
		});
	}
}

export const hasExtension = (pathArg: string, extension: string) => pathArg.toLowerCase().endsWith(extension.toLowerCase());

/**
 * Resolves and checks the source and destination arguments. Without a destination,
 * a single archive unpacks beside itself and a directory of archives into itself.
 */
export async function resolvePathArguments(extension: string, source: string, destination?: string): Promise<[source: string, destination: string]> {
	source = path.resolve(source);
	await checkPath(source, 'source');

	if (typeof destination === 'string') {
		destination = path.resolve(destination);
		await checkPath(destination, 'destination');
		return [source, destination];
	}

	const sourceEntry = await fsP.stat(source);
	return [source, hasExtension(source, extension) && sourceEntry.isFile() ? path.dirname(source) : source];
}
