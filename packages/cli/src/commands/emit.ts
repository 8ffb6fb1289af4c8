/**
 * taglog emit — Emit one message through the configured handlers.
 *
 *   taglog emit "cache warmed" cache info
 *   taglog emit "slow query" --name blog_sql_warning --trace
 */

import { TRACE_TAG } from '@taglog/core';
import type { Command } from 'commander';
import { loadCliLogger } from '../config.js';
import * as output from '../output.js';
import type { GlobalOptions } from '../program.js';

type EmitCommandOptions = GlobalOptions & {
	name?: string;
	trace?: boolean;
};

export function registerEmitCommand(program: Command): void {
	program
		.command('emit <message> [tags...]')
		.description('Emit a message with the given tags')
		.option('-n, --name <name>', 'Derive tags from an underscore-joined name')
		.option('-t, --trace', 'Add the trace tag (records the call site)')
		.action(async (message: string, tags: string[], _opts: unknown, cmd: Command) => {
			const opts = cmd.optsWithGlobals<EmitCommandOptions>();
			try {
				const { logger } = await loadCliLogger(opts.config);
				try {
					const all = opts.name ? [...logger.named(opts.name).tags, ...tags] : [...tags];
					if (opts.trace) all.push(TRACE_TAG);
					logger.emit(message, all);
				} finally {
					logger.close();
				}
			} catch (err) {
				output.error(`Emit failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
