/**
 * taglog check — Validate a config file and list its handlers.
 */

import { createLoggerFromConfig, loadConfig } from '@taglog/core';
import type { TargetConfig } from '@taglog/sdk';
import type { Command } from 'commander';
import { resolveConfigPath } from '../config.js';
import * as output from '../output.js';
import type { GlobalOptions } from '../program.js';

export function describeTarget(target: TargetConfig | undefined): string {
	if (!target) return 'stdout';
	const sinks: string[] = [];
	if (target.filename) sinks.push(target.filename);
	if (target.stdout) sinks.push('stdout');
	if (target.stderr) sinks.push('stderr');
	return sinks.join(', ') || '(none)';
}

export function registerCheckCommand(program: Command): void {
	program
		.command('check')
		.description('Validate the config and list handlers')
		.action(async (_opts: unknown, cmd: Command) => {
			const opts = cmd.optsWithGlobals<GlobalOptions>();
			const configPath = resolveConfigPath(opts.config);
			if (!configPath) {
				output.error('No config found. Pass --config, set TAGLOG_CONFIG, or create taglog.yaml');
				process.exitCode = 1;
				return;
			}

			try {
				const config = await loadConfig(configPath);
				// Building the logger compiles every template
				createLoggerFromConfig(config).close();

				const mode = config.default?.mode ?? 'always';
				const rows = config.handlers.map((h) => ({
					name: h.name,
					tags: h.tags.join(', '),
					target: describeTarget(h.target),
					formatter: h.formatter ? 'custom' : 'default',
				}));

				if (output.isJsonMode()) {
					output.json({
						config: configPath,
						valid: true,
						handlers: rows,
						default: { mode, target: describeTarget(config.default?.target) },
					});
					return;
				}

				output.success(`${configPath} is valid`);
				if (rows.length > 0) {
					output.table(
						[
							{ header: 'NAME', key: 'name' },
							{ header: 'TAGS', key: 'tags' },
							{ header: 'TARGET', key: 'target' },
							{ header: 'FORMATTER', key: 'formatter' },
						],
						rows,
					);
				} else {
					output.warn('No handlers declared; every emission goes to the default target');
				}
				output.info(`Default path: ${mode} → ${describeTarget(config.default?.target)}`);
			} catch (err) {
				if (output.isJsonMode()) {
					output.json({
						config: configPath,
						valid: false,
						error: err instanceof Error ? err.message : String(err),
					});
				}
				output.error(err instanceof Error ? err.message : String(err));
				process.exitCode = 1;
			}
		});
}
