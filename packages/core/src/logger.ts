/**
 * TagLogger — routes emissions to handlers by tag.
 *
 * Library-first API:
 *   const log = new TagLogger({ handlers: [sqlHandler] });
 *   log.emit('slow query', ['blog', 'sql', 'warning']);
 *   log.dispatch('blog_sql_warning', 'slow query');
 *   const sql = log.named('blog_sql'); sql('connected');
 *
 * emit() runs matching, formatting and writing to completion before it
 * returns. A failing handler is reported and skipped; the others still
 * receive the emission.
 */

import type { Clock, DefaultPathMode, ErrorContext, ErrorReporter, TraceSource } from '@taglog/sdk';
import { ReservedNameError, TraceCaptureError } from './errors.js';
import { type Emission, Formatter } from './formatter.js';
import type { Handler } from './handler.js';
import { stdoutSink } from './sinks.js';
import { TRACE_TAG, type TagInput, TagSet, sharedTags } from './tags.js';
import { Target } from './target.js';
import { StackTraceSource, formatErrorStack } from './trace.js';

// ─── Options ──────────────────────────────────────────────────────────────────

export interface TagLoggerOptions {
	/** Checked in order; every matching handler receives the emission */
	handlers?: Handler[];
	/** Default: stdout */
	defaultTarget?: Target;
	/** Default: a Formatter with stock options */
	defaultFormatter?: Formatter;
	/**
	 * When the default target receives an emission:
	 * - 'always': every emission, all tags rendered (default)
	 * - 'unmatched': when some tag was claimed by no handler, rendering those tags
	 * - 'off': never
	 */
	defaultPath?: DefaultPathMode;
	clock?: Clock;
	traceSource?: TraceSource;
	/** Receives isolated per-emission failures. Default: one line on stderr */
	onError?: ErrorReporter;
	/** Separator for tag names given to named() and dispatch(). Default: '_' */
	delimiter?: string;
}

export interface EmitOptions {
	/** Stack block appended after the line of a `trace`-tagged emission */
	error?: unknown;
}

/** A logger bound to a fixed tag set */
export interface TaggedLog {
	(message: string, options?: EmitOptions): void;
	readonly tags: TagSet;
}

export interface RoutePreview {
	tags: TagSet;
	/** Names of matching handlers, in order */
	handlers: string[];
	/** Whether the default target would also receive the emission */
	defaultPath: boolean;
}

/** Names that are logger operations, not tag names */
export const RESERVED_NAMES: ReadonlySet<string> = new Set([
	'emit',
	'log',
	'dispatch',
	'named',
	'tagged',
	'matching',
	'handlers',
	'close',
]);

export const DEFAULT_HANDLER_NAME = 'default';

export const reportToStderr: ErrorReporter = (error, context) => {
	process.stderr.write(`taglog: ${context.handler}: ${error.message}\n`);
};

// ─── TagLogger ────────────────────────────────────────────────────────────────

export class TagLogger {
	readonly handlers: readonly Handler[];
	readonly defaultTarget: Target;
	readonly defaultFormatter: Formatter;
	readonly defaultPath: DefaultPathMode;
	private readonly clock: Clock;
	private readonly traceSource: TraceSource;
	private readonly onError: ErrorReporter;
	private readonly delimiter: string;

	constructor(options: TagLoggerOptions = {}) {
		this.handlers = Object.freeze([...(options.handlers ?? [])]);
		this.defaultTarget = options.defaultTarget ?? new Target([stdoutSink()]);
		this.defaultFormatter = options.defaultFormatter ?? new Formatter();
		this.defaultPath = options.defaultPath ?? 'always';
		this.clock = options.clock ?? (() => new Date());
		this.traceSource = options.traceSource ?? new StackTraceSource();
		this.onError = options.onError ?? reportToStderr;
		this.delimiter = options.delimiter ?? '_';
	}

	/**
	 * Emit a message with explicit tags (`'sql'` or `['blog', 'sql']`).
	 * No tags means `{default}`.
	 * Throws InvalidTagError before any handler runs if a tag is malformed.
	 */
	emit(message: string, tags: TagInput = [], options: EmitOptions = {}): void {
		this.deliver(TagSet.forEmission(tags), message, options, this.emit);
	}

	/** Emit with the `{default}` tag set */
	log(message: string): void {
		this.deliver(TagSet.forEmission(), message, {}, this.log);
	}

	/**
	 * Emit with tags derived from a name: `dispatch('general_info', msg)`
	 * is `emit(msg, ['general', 'info'])`.
	 */
	dispatch(name: string, message: string, options: EmitOptions = {}): void {
		this.deliver(this.tagsForName(name), message, options, this.dispatch);
	}

	/** Bind the tags derived from a name, validated once */
	named(name: string): TaggedLog {
		return this.bind(this.tagsForName(name));
	}

	/** Bind explicit tags, validated once */
	tagged(...tags: string[]): TaggedLog {
		return this.bind(TagSet.forEmission(tags));
	}

	/** Which handlers an emission with these tags would reach */
	matching(tags: TagInput = []): RoutePreview {
		const set = TagSet.forEmission(tags);
		const claimed = new Set<string>();
		const handlers: string[] = [];
		for (const handler of this.handlers) {
			if (!handler.accepts(set)) continue;
			handlers.push(handler.name);
			for (const tag of sharedTags(set, handler.tags)) claimed.add(tag);
		}
		return { tags: set, handlers, defaultPath: this.defaultTags(set, claimed) !== null };
	}

	/**
	 * Close every handler target and the default target. All targets are
	 * attempted; the first failure is rethrown afterwards.
	 */
	close(): void {
		let firstError: unknown;
		for (const target of [...this.handlers.map((h) => h.target), this.defaultTarget]) {
			try {
				target.close();
			} catch (err) {
				if (firstError === undefined) firstError = err;
			}
		}
		if (firstError !== undefined) throw firstError;
	}

	// ─── Internals ────────────────────────────────────────────────────────────

	private tagsForName(name: string): TagSet {
		if (RESERVED_NAMES.has(name)) throw new ReservedNameError(name);
		return TagSet.fromName(name, this.delimiter);
	}

	private bind(tags: TagSet): TaggedLog {
		const log = (message: string, options: EmitOptions = {}): void => {
			this.deliver(tags, message, options, log);
		};
		return Object.assign(log, { tags });
	}

	/** Tags the default path renders, or null when it is skipped */
	private defaultTags(tags: TagSet, claimed: ReadonlySet<string>): readonly string[] | null {
		switch (this.defaultPath) {
			case 'off':
				return null;
			case 'unmatched': {
				const unclaimed = tags.tags.filter((t) => !claimed.has(t));
				return unclaimed.length > 0 ? unclaimed : null;
			}
			default:
				return tags.tags;
		}
	}

	private captureTrace(boundary: (...args: never[]) => unknown, message: string) {
		try {
			return this.traceSource.capture(boundary);
		} catch (err) {
			this.report(new TraceCaptureError({ cause: err }), { handler: TRACE_TAG, message });
			return undefined;
		}
	}

	private deliver(
		tags: TagSet,
		message: string,
		options: EmitOptions,
		boundary: (...args: never[]) => unknown,
	): void {
		const emission: Emission = { message, tags, timestamp: this.clock() };
		if (tags.has(TRACE_TAG)) {
			emission.trace = this.captureTrace(boundary, message);
			if (options.error !== undefined) emission.errorStack = formatErrorStack(options.error);
		}

		const claimed = new Set<string>();
		for (const handler of this.handlers) {
			if (!handler.accepts(tags)) continue;
			for (const tag of sharedTags(tags, handler.tags)) claimed.add(tag);
			try {
				handler.handle(emission);
			} catch (err) {
				this.report(err, { handler: handler.name, message });
			}
		}

		const defaultTags = this.defaultTags(tags, claimed);
		if (defaultTags === null) return;
		try {
			const line = this.defaultFormatter.formatLine(emission, defaultTags, DEFAULT_HANDLER_NAME);
			this.defaultTarget.write(`${line}\n`);
		} catch (err) {
			this.report(err, { handler: DEFAULT_HANDLER_NAME, message });
		}
	}

	private report(err: unknown, context: ErrorContext): void {
		const error = err instanceof Error ? err : new Error(String(err));
		try {
			this.onError(error, context);
		} catch (reporterErr) {
			// Reporter failures fall back to stderr; delivery continues
			reportToStderr(error, context);
			reportToStderr(
				reporterErr instanceof Error ? reporterErr : new Error(String(reporterErr)),
				{ handler: 'reporter', message: context.message },
			);
		}
	}
}
