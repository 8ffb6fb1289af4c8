/**
 * Targets fan one rendered line out to every configured sink.
 */

import { resolve } from 'node:path';
import type { Sink, TargetConfig } from '@taglog/sdk';
import { SinkWriteError } from './errors.js';
import { FileSink, stderrSink, stdoutSink } from './sinks.js';

export class Target {
	readonly sinks: readonly Sink[];

	constructor(sinks: Sink[] = []) {
		this.sinks = Object.freeze([...sinks]);
	}

	/** A target with no sinks silently drops everything */
	get isNoop(): boolean {
		return this.sinks.length === 0;
	}

	/**
	 * Write to every sink. All sinks are attempted; failures are collected
	 * into one SinkWriteError thrown afterwards.
	 */
	write(chunk: string): void {
		const failed: string[] = [];
		let firstError: unknown;
		for (const sink of this.sinks) {
			try {
				sink.write(chunk);
			} catch (err) {
				failed.push(sink.name);
				if (firstError === undefined) firstError = err;
			}
		}
		if (failed.length > 0) {
			throw new SinkWriteError(failed, { cause: firstError });
		}
	}

	/** Close sinks that hold resources. Close failures are collected like writes. */
	close(): void {
		const failed: string[] = [];
		let firstError: unknown;
		for (const sink of this.sinks) {
			try {
				sink.close?.();
			} catch (err) {
				failed.push(sink.name);
				if (firstError === undefined) firstError = err;
			}
		}
		if (failed.length > 0) {
			throw new SinkWriteError(failed, { cause: firstError });
		}
	}
}

export interface CreateTargetOptions {
	/** Relative filenames are resolved against this directory (default: cwd) */
	baseDir?: string;
	/** Sinks appended after the declared ones */
	extraSinks?: Sink[];
}

/**
 * Build a target from a sink declaration. Several destinations may be set
 * at once; the same line goes to each, file first.
 */
export function createTarget(config: TargetConfig, options: CreateTargetOptions = {}): Target {
	const sinks: Sink[] = [];
	if (config.filename) {
		sinks.push(new FileSink(resolve(options.baseDir ?? process.cwd(), config.filename)));
	}
	if (config.stdout) sinks.push(stdoutSink());
	if (config.stderr) sinks.push(stderrSink());
	if (options.extraSinks) sinks.push(...options.extraSinks);
	return new Target(sinks);
}
