/**
 * Built-in sinks: append-mode files and process streams.
 *
 * Each write is a single synchronous call, so one rendered line is never
 * split by another emission.
 */

import { closeSync, openSync, writeSync } from 'node:fs';
import type { Sink } from '@taglog/sdk';

/**
 * Appends to a file. The file is opened on first write, so a missing
 * directory surfaces as a write failure of the owning handler.
 */
export class FileSink implements Sink {
	readonly name: string;
	private fd: number | null = null;

	constructor(readonly path: string) {
		this.name = path;
	}

	write(chunk: string): void {
		if (this.fd === null) {
			this.fd = openSync(this.path, 'a');
		}
		writeSync(this.fd, chunk);
	}

	close(): void {
		if (this.fd === null) return;
		const fd = this.fd;
		this.fd = null;
		closeSync(fd);
	}
}

interface WritableLike {
	write(chunk: string): unknown;
}

/**
 * Writes to a stream such as process.stdout. The stream is not owned and
 * is not closed.
 */
export class StreamSink implements Sink {
	readonly name: string;
	private readonly stream: WritableLike;

	constructor(name: string, stream: WritableLike) {
		this.name = name;
		this.stream = stream;
	}

	write(chunk: string): void {
		this.stream.write(chunk);
	}
}

export function stdoutSink(): StreamSink {
	return new StreamSink('stdout', process.stdout);
}

export function stderrSink(): StreamSink {
	return new StreamSink('stderr', process.stderr);
}
