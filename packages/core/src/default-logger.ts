/**
 * Process-wide default logger.
 *
 * Nothing is created at import time. Call configureLogger() once at
 * startup; getLogger() falls back to a stock logger (no handlers,
 * everything on stdout) the first time it is called without one.
 */

import { TagLogger, type TagLoggerOptions } from './logger.js';

let current: TagLogger | null = null;

/**
 * Install the process-wide logger. A previously installed logger is
 * closed first.
 */
export function configureLogger(loggerOrOptions: TagLogger | TagLoggerOptions = {}): TagLogger {
	const next =
		loggerOrOptions instanceof TagLogger ? loggerOrOptions : new TagLogger(loggerOrOptions);
	if (current && current !== next) current.close();
	current = next;
	return next;
}

export function getLogger(): TagLogger {
	if (!current) current = new TagLogger();
	return current;
}

/** Close and forget the installed logger */
export function resetLogger(): void {
	const previous = current;
	current = null;
	previous?.close();
}
