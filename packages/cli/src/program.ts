/**
 * Command tree for the taglog CLI.
 */

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerEmitCommand } from './commands/emit.js';
import { registerMatchCommand } from './commands/match.js';
import { registerVersionCommand } from './commands/version.js';
import * as output from './output.js';

export type GlobalOptions = {
	config?: string;
	json?: boolean;
	quiet?: boolean;
};

export function createProgram(): Command {
	const program = new Command();

	program
		.name('taglog')
		.description('Tag-routed logging')
		.option('-c, --config <path>', 'Config file (default: $TAGLOG_CONFIG or ./taglog.yaml)')
		.option('--json', 'Machine-readable output')
		.option('-q, --quiet', 'Only print errors')
		.hook('preAction', (thisCommand) => {
			const opts = thisCommand.opts<GlobalOptions>();
			output.setMode(opts.json ? 'json' : opts.quiet ? 'quiet' : 'text');
		});

	registerEmitCommand(program);
	registerCheckCommand(program);
	registerMatchCommand(program);
	registerVersionCommand(program);

	return program;
}

export { registerCheckCommand, registerEmitCommand, registerMatchCommand, registerVersionCommand };
