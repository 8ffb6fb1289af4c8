/**
 * Call-site capture for `trace`-tagged emissions.
 */

import { basename } from 'node:path';
import type { CallSite, TraceSource } from '@taglog/sdk';

// "    at fn (/path/file.ts:12:5)" or "    at /path/file.ts:12:5"
const FRAME_RE = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

export function parseStackFrame(frame: string): CallSite | undefined {
	const match = FRAME_RE.exec(frame);
	if (!match) return undefined;
	const [, fn = '', location, line] = match;
	const module = fn.replace(/^(?:async |new )/, '');
	return {
		file: basename(location),
		line,
		// Top-level code: "<anonymous>", "Object.<anonymous>"
		module: module.endsWith('<anonymous>') ? '' : module,
	};
}

/**
 * Reads the caller from a V8 stack trace.
 */
export class StackTraceSource implements TraceSource {
	capture(boundary: (...args: never[]) => unknown): CallSite | undefined {
		const holder: { stack?: string } = {};
		Error.captureStackTrace(holder, boundary);
		if (!holder.stack) return undefined;

		for (const frame of holder.stack.split('\n').slice(1)) {
			const site = parseStackFrame(frame);
			if (site) return site;
		}
		return undefined;
	}
}

/**
 * For runtimes without stack introspection.
 */
export class NoTraceSource implements TraceSource {
	capture(_boundary: (...args: never[]) => unknown): CallSite | undefined {
		return undefined;
	}
}

/** Format an error for the block appended after a traced line */
export function formatErrorStack(error: unknown): string {
	if (error instanceof Error) return error.stack || `${error.name}: ${error.message}`;
	return `Non-Error exception: ${String(error)}`;
}
