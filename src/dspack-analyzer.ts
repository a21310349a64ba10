import path from 'path';

import { Command } from 'commander';

import { withArchive } from './dspack/archive.js';
import { formatSummary } from './dspack/summary.js';

import { findSourceFiles } from './util/find-source-files.js';
import { resolvePathArguments } from './util/resolve-path-arguments.js';
import { log, logError, logWarn } from './util/wrapped-log.js';

const EXTENSION = '.dspack';
const DEFAULT_MAX_FOLDERS = 50;

interface Settings {
	verbose?: boolean;
}

export class DsPackAnalyzer {
	static command = new Command()
		.command('analyze <source>')
		.description('print the structure of one or more .dspack archives')
		.option('-v, --verbose', 'list every folder')
		.action(async (source: string) => {
			const [sourceRoot] = await resolvePathArguments(EXTENSION, source);

			const analyzer = new DsPackAnalyzer(sourceRoot, DsPackAnalyzer.command.opts<Settings>());
			await analyzer.run();
		});

	private constructor(
		private readonly sourceRoot: string,
		private readonly settings: Settings,
	) {}

	private async run() {
		const archives = await findSourceFiles(this.sourceRoot, EXTENSION);
		log('[Scanning] %s', this.sourceRoot);
		log('Found %d %s file(s)', archives.length, EXTENSION);

		let failed = 0;
		for (const archivePath of archives) {
			log('\n%s', '='.repeat(50));
			try {
				await withArchive(archivePath, async archive => {
					const lines = formatSummary(archive.analyze(), { maxFolders: this.settings.verbose ? Infinity : DEFAULT_MAX_FOLDERS });
					for (const line of lines) log('%s', line);
				});
			} catch (err: unknown) {
				failed++;
				logError('%s: %s', path.relative(this.sourceRoot, archivePath) || path.basename(archivePath), err instanceof Error ? err.message : String(err));
			}
		}

		if (failed > 0) {
			logWarn('%d of %d archive(s) could not be analyzed.', failed, archives.length);
			process.exitCode = 1;
		}
	}
}
