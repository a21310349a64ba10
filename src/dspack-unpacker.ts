import path from 'path';

import { Command } from 'commander';

import { withArchive } from './dspack/archive.js';
import { formatSummary } from './dspack/summary.js';

import { findSourceFiles } from './util/find-source-files.js';
import { ProgressLogger } from './util/progress-logger.js';
import { resolvePathArguments } from './util/resolve-path-arguments.js';
import { extractionLog, log, logError, logWarn } from './util/wrapped-log.js';

import type { LogLine } from './types/dspack.js';

const EXTENSION = '.dspack';

interface Settings {
	verbose?: boolean;
	analyze?: boolean;
}

export class DsPackUnpacker {
	static command = new Command()
		.command('unpack <source> [destination]')
		.description('unpack one or more .dspack archives')
		.option('-v, --verbose', 'print every extracted file')
		.option('-a, --analyze', 'print an analysis of each archive before unpacking it')
		.action(async (source: string, destination?: string) => {
			const [sourceRoot, destinationRoot] = await resolvePathArguments(EXTENSION, source, destination);

			const unpacker = new DsPackUnpacker(sourceRoot, destinationRoot, DsPackUnpacker.command.opts<Settings>());
			await unpacker.run();
		});

	private readonly deferredWarnings: string[] = [];
	private readonly deferredErrors: string[] = [];
	private readonly progressLogger?: ProgressLogger;
	private failedArchives = 0;
	private incompleteArchives = 0;

	private constructor(
		private readonly sourceRoot: string,
		private readonly destinationRoot: string,
		private readonly settings: Settings,
	) {
		if (!this.settings.verbose && !this.settings.analyze && ProgressLogger.isSupported) this.progressLogger = new ProgressLogger();
	}

	private async run() {
		if (this.settings.verbose) console.time('Duration');

		const archives = await findSourceFiles(this.sourceRoot, EXTENSION);
		const sourceBase = archives.length === 1 && archives[0] === this.sourceRoot ? path.dirname(this.sourceRoot) : this.sourceRoot;

		this.progressLogger?.start(archives.length, `Unpacking ${archives.length} archive(s) into ${this.destinationRoot}`);

		for (const archivePath of archives) {
			const relativePath = path.relative(sourceBase, archivePath);
			await this.unpackArchive(archivePath, relativePath);
			this.progressLogger?.tick();
		}

		for (const line of this.deferredWarnings) logWarn('%s', line);
		for (const line of this.deferredErrors) logError('%s', line);

		if (this.failedArchives > 0 || this.incompleteArchives > 0) {
			logError('%d of %d archive(s) failed, %d extracted with errors or as-is files.', this.failedArchives, archives.length, this.incompleteArchives);
			process.exitCode = 1;
		}

		if (this.settings.verbose) console.timeEnd('Duration');
	}

	private async unpackArchive(archivePath: string, relativePath: string) {
		const destinationPath = path.join(this.destinationRoot, relativePath).replace(/\.dspack$/i, '-dspack');
		// warnings would break the progress line; they are collected from the result instead
		const logLine: LogLine = this.progressLogger ? () => undefined : extractionLog(this.settings.verbose ?? false);

		logLine(`\nProcessing ${relativePath}`);

		try {
			await withArchive(archivePath, async archive => {
				if (this.settings.analyze) for (const line of formatSummary(archive.analyze())) log('%s', line);

				logLine(`Extracting files to ${destinationPath}`);
				const result = await archive.extractAll(destinationPath, { log: logLine });

				if (!result.success) {
					this.incompleteArchives++;
					if (this.progressLogger) {
						for (const writtenPath of result.fallbacks) this.deferredWarnings.push(`${relativePath}: ${writtenPath} extracted as-is`);
						for (const failure of result.failures) this.deferredWarnings.push(`${relativePath}: ${failure.name}: ${failure.reason}`);
					}
				}
			});
		} catch (err: unknown) {
			this.failedArchives++;
			const message = `Error processing ${relativePath}: ${err instanceof Error ? err.message : String(err)}`;
			if (this.progressLogger) {
				this.deferredErrors.push(message);
			} else {
				logError('%s', message);
			}
			if (!(err instanceof Error) || this.settings.verbose) console.error(err);
		}
	}
}
