/**
 * taglog version — Versions of the taglog packages and the runtime.
 *
 * `taglog --version` prints the CLI version alone (commander's flag);
 * this command lists every component and the config the CLI would use.
 */

import { createRequire } from 'node:module';
import type { Command } from 'commander';
import { resolveConfigPath } from '../config.js';
import * as output from '../output.js';
import type { GlobalOptions } from '../program.js';

const require = createRequire(import.meta.url);

/** Packages reported by `taglog version`, by manifest specifier */
const COMPONENTS = {
	cli: '@taglog/cli/package.json',
	core: '@taglog/core/package.json',
	sdk: '@taglog/sdk/package.json',
} as const;

export type Component = keyof typeof COMPONENTS;

export function packageVersion(component: Component): string {
	let manifest: unknown;
	try {
		manifest = require(COMPONENTS[component]);
	} catch {
		return 'unknown';
	}
	if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
		return typeof manifest.version === 'string' ? manifest.version : 'unknown';
	}
	return 'unknown';
}

export function registerVersionCommand(program: Command): void {
	program.version(packageVersion('cli'), '-V, --version', 'Print the CLI version');

	program
		.command('version')
		.description('Print package, runtime and config details')
		.action((_opts: unknown, cmd: Command) => {
			const opts = cmd.optsWithGlobals<GlobalOptions>();
			const components = {
				cli: packageVersion('cli'),
				core: packageVersion('core'),
				sdk: packageVersion('sdk'),
			};
			const runtime = { node: process.version, platform: `${process.platform} ${process.arch}` };
			const config = resolveConfigPath(opts.config) ?? null;

			if (output.isJsonMode()) {
				output.json({ ...components, ...runtime, config });
				return;
			}

			output.table(
				[
					{ header: 'COMPONENT', key: 'component' },
					{ header: 'VERSION', key: 'version' },
				],
				[
					...Object.entries(components).map(([name, version]) => ({ component: `@taglog/${name}`, version })),
					{ component: 'node', version: runtime.node },
					{ component: 'platform', version: runtime.platform },
				],
			);
			output.info(`config: ${config ?? '(none, stdout defaults)'}`);
		});
}
