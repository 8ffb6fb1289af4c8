/**
 * taglog match — Show which handlers an emission with the given tags reaches.
 */

import type { Command } from 'commander';
import { loadCliLogger } from '../config.js';
import * as output from '../output.js';
import type { GlobalOptions } from '../program.js';

export function registerMatchCommand(program: Command): void {
	program
		.command('match [tags...]')
		.description('Preview routing for a tag set (no tags means {default})')
		.action(async (tags: string[], _opts: unknown, cmd: Command) => {
			const opts = cmd.optsWithGlobals<GlobalOptions>();
			try {
				const { logger } = await loadCliLogger(opts.config);
				const preview = logger.matching(tags);
				logger.close();

				if (output.isJsonMode()) {
					output.json({
						tags: [...preview.tags],
						handlers: preview.handlers,
						default: preview.defaultPath,
					});
					return;
				}

				output.heading(`Tags ${preview.tags}`);
				for (const name of preview.handlers) output.route(name, true);
				if (preview.handlers.length === 0) output.route('no handler subscribes to these tags', false);
				output.route(`default (${logger.defaultPath})`, preview.defaultPath);
			} catch (err) {
				output.error(`Match failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
