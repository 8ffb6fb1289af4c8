/**
 * Config discovery for the CLI.
 *
 * Order: --config flag, TAGLOG_CONFIG env var, ./taglog.yaml.
 * Without any of them the CLI runs a stock logger (stdout only).
 */

import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { type TagLogger, createLoggerFromConfig, loadConfig } from '@taglog/core';
import type { TaglogConfig } from '@taglog/sdk';

export const CONFIG_ENV = 'TAGLOG_CONFIG';
export const DEFAULT_CONFIG_FILE = 'taglog.yaml';

export function resolveConfigPath(
	explicit?: string,
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): string | undefined {
	if (explicit) return resolve(cwd, explicit);
	const fromEnv = env[CONFIG_ENV];
	if (fromEnv) return resolve(cwd, fromEnv);
	const candidate = join(cwd, DEFAULT_CONFIG_FILE);
	return existsSync(candidate) ? candidate : undefined;
}

export interface CliLogger {
	logger: TagLogger;
	config: TaglogConfig;
	/** Absolute config path, or undefined when running with defaults */
	configPath?: string;
}

export async function loadCliLogger(explicit?: string): Promise<CliLogger> {
	const configPath = resolveConfigPath(explicit);
	const config: TaglogConfig = configPath ? await loadConfig(configPath) : { handlers: [] };
	const logger = createLoggerFromConfig(config, {
		baseDir: configPath ? dirname(configPath) : process.cwd(),
	});
	return { logger, config, configPath };
}
