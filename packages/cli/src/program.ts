/**
 * The chanlog command line.
 */

import { Command } from 'commander';
import { registerInspectCommand } from './commands/inspect.js';
import { registerPipeCommand } from './commands/pipe.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

export function createProgram(): Command {
	const program = new Command();

	program
		.name('chanlog')
		.description('Multi-channel log files for scripts and builds')
		.option('--config <path>', 'Path to chanlog.yaml (default: ./chanlog.yaml or CHANLOG_CONFIG)')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only report errors')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts();
			output.setJsonMode(Boolean(opts.json));
			output.setQuietMode(Boolean(opts.quiet));
		});

	registerPipeCommand(program);
	registerInspectCommand(program);
	registerVersionCommand(program);

	return program;
}
