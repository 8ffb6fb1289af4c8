/**
 * Test harness for taglog users and sink authors.
 *
 * In-memory stand-ins for sinks, clocks and trace sources so routing
 * and rendering can be asserted without touching files or stdout.
 */

import type { CallSite, Clock, ErrorContext, Sink, TraceSource } from './types.js';

// ─── Memory Sink ──────────────────────────────────────────────────────────────

/**
 * Sink that records every chunk written to it.
 */
export class MemorySink implements Sink {
	readonly name: string;
	readonly chunks: string[] = [];
	closed = false;

	constructor(name = 'memory') {
		this.name = name;
	}

	write(chunk: string): void {
		this.chunks.push(chunk);
	}

	close(): void {
		this.closed = true;
	}

	/** Written chunks with their trailing newline removed */
	get lines(): string[] {
		return this.chunks.map((c) => (c.endsWith('\n') ? c.slice(0, -1) : c));
	}

	clear(): void {
		this.chunks.length = 0;
	}
}

// ─── Failing Sink ─────────────────────────────────────────────────────────────

/**
 * Sink whose writes always throw, for exercising failure isolation.
 */
export class FailingSink implements Sink {
	readonly name: string;
	attempts = 0;
	private readonly reason: string;

	constructor(name = 'failing', reason = 'sink unavailable') {
		this.name = name;
		this.reason = reason;
	}

	write(_chunk: string): void {
		this.attempts++;
		throw new Error(this.reason);
	}
}

// ─── Trace sources ────────────────────────────────────────────────────────────

/**
 * Trace source that always reports the same call site.
 */
export class StaticTraceSource implements TraceSource {
	private readonly site: CallSite | undefined;

	constructor(site?: Partial<CallSite>) {
		this.site = site ? { file: '', line: '', module: '', ...site } : undefined;
	}

	capture(_boundary: (...args: never[]) => unknown): CallSite | undefined {
		return this.site;
	}
}

/**
 * Trace source that throws on every capture.
 */
export class ThrowingTraceSource implements TraceSource {
	capture(_boundary: (...args: never[]) => unknown): CallSite | undefined {
		throw new Error('stack unavailable');
	}
}

// ─── Clock ────────────────────────────────────────────────────────────────────

/**
 * Clock frozen at the given instant.
 */
export function fixedClock(iso = '2024-01-15T10:30:45.123Z'): Clock {
	const time = new Date(iso).getTime();
	return () => new Date(time);
}

// ─── Error collection ─────────────────────────────────────────────────────────

/**
 * Error reporter that records reports instead of printing them.
 */
export function collectErrors(): {
	reports: Array<{ error: Error; context: ErrorContext }>;
	reporter: (error: Error, context: ErrorContext) => void;
} {
	const reports: Array<{ error: Error; context: ErrorContext }> = [];
	return {
		reports,
		reporter: (error, context) => {
			reports.push({ error, context });
		},
	};
}
