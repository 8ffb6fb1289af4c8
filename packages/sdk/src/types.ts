/**
 * Shared contracts for taglog.
 *
 * Sinks, trace sources, clocks and error reporters are the seams where
 * I/O and runtime introspection plug into the routing pipeline.
 */

// ─── Sinks ────────────────────────────────────────────────────────────────────

/**
 * A writable destination for rendered lines.
 *
 * `write` receives one complete line (terminator included) per call and
 * must write it in a single operation so concurrent emissions never
 * interleave bytes within a line.
 */
export interface Sink {
	/** Human-readable identifier used in error reports (e.g. a file path) */
	readonly name: string;

	write(chunk: string): void;

	/** Release any resource held by the sink */
	close?(): void;
}

// ─── Trace ────────────────────────────────────────────────────────────────────

/** Call-site metadata captured for `trace`-tagged emissions. */
export interface CallSite {
	/** Base name of the source file */
	file: string;
	/** 1-based line number, as a string so it can be empty */
	line: string;
	/** Enclosing function or module name */
	module: string;
}

/**
 * Optional capability for capturing the caller of a logging entry point.
 *
 * `boundary` is the public function the caller invoked; frames at and
 * above it are skipped. Returns undefined when the runtime cannot tell.
 */
export interface TraceSource {
	capture(boundary: (...args: never[]) => unknown): CallSite | undefined;
}

// ─── Clock ────────────────────────────────────────────────────────────────────

export type Clock = () => Date;

// ─── Error reporting ──────────────────────────────────────────────────────────

export interface ErrorContext {
	/** Handler name, 'default' for the default path, 'trace' for call-site capture */
	handler: string;
	/** Emission message that was being delivered */
	message: string;
}

/**
 * Receives per-emission failures that are isolated from the caller.
 * Must not throw.
 */
export type ErrorReporter = (error: Error, context: ErrorContext) => void;

// ─── Configuration documents ──────────────────────────────────────────────────

/** Sink declaration, as written in a config file */
export interface TargetConfig {
	filename?: string;
	stdout?: boolean;
	stderr?: boolean;
}

/** Named tag casing transforms available from config files */
export type TagCase = 'upper' | 'lower' | 'capitalize' | 'none';

/** Formatter overrides, as written in a config file (snake_case keys) */
export interface FormatterConfig {
	template?: string;
	tags_template?: string;
	tag_template?: string;
	tag_case?: TagCase;
	tag_delimiter?: string;
	date_template?: string;
	date_format?: string;
	time_template?: string;
	time_format?: string;
	datetime_template?: string;
	file_template?: string;
	line_template?: string;
	module_template?: string;
	trace_template?: string;
	utc?: boolean;
}

export interface HandlerConfig {
	name: string;
	tags: string[];
	target: TargetConfig;
	formatter?: FormatterConfig;
}

/** When the default target receives an emission */
export type DefaultPathMode = 'always' | 'unmatched' | 'off';

export interface DefaultConfig {
	mode?: DefaultPathMode;
	target?: TargetConfig;
	formatter?: FormatterConfig;
}

/** Root of a taglog config file */
export interface TaglogConfig {
	default?: DefaultConfig;
	handlers: HandlerConfig[];
}
