#!/usr/bin/env node
import cliCursor from 'cli-cursor';
import { program } from 'commander';

import { CustomError } from './errors.js';

import { DsPackAnalyzer } from './dspack-analyzer.js';
import { DsPackUnpacker } from './dspack-unpacker.js';

import { logError } from './util/wrapped-log.js';

cliCursor.hide(process.stdout);

program
	.name('dspack-extractor')
	.description('Analyze and unpack .dspack game archives');

program
	.command('dspack')
	.description('.dspack archive')
	.addHelpCommand(false)
	.addCommand(DsPackAnalyzer.command)
	.addCommand(DsPackUnpacker.command);

program
	.addHelpCommand(false)
	.parseAsync()
	.catch(err => {
		if (err instanceof CustomError) {
			logError(err.message);
		} else {
			console.error(err);
		}
		process.exitCode = 1;
	});
