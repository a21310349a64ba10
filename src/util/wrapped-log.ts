import { format } from 'util';

import chalk from 'chalk';
import termSize from 'term-size';
import wrapAnsi from 'wrap-ansi';

import type { LogLine } from '../types/dspack.js';

let columns = 80;

const resize = () => {
	({ columns } = termSize());
	if (process.platform === 'win32') columns--;
};
resize();

process.stdout.on('resize', resize);

const logWrap = (logger: (...args: unknown[]) => void, message: string, ...params: unknown[]) => {
	logger(wrapAnsi(format(message, ...params), columns, { hard: true, trim: false }));
};

export const log      = (message: string, ...params: unknown[]) => logWrap(console.log,                                 message,   ...params);
export const logWarn  = (message: string, ...params: unknown[]) => logWrap(console.log,   `[${chalk.yellow('WARN')}] ${message}`, ...params);
export const logError = (message: string, ...params: unknown[]) => logWrap(console.error, `[${chalk.red('ERROR')}] ${message}`,   ...params);

const WARNING_MARKER = '(!!) ';

/**
 * Routes extraction lines to the console. Lines carrying the warning marker are
 * logged as warnings; the rest only when `verbose` is set.
 */
export const extractionLog = (verbose: boolean): LogLine => line => {
	if (line.startsWith(WARNING_MARKER)) {
		logWarn('%s', line.slice(WARNING_MARKER.length));
	} else if (verbose) {
		log('%s', line);
	}
};
