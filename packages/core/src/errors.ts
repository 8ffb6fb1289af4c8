/**
 * Error types for taglog.
 *
 * Construction-time errors (bad tags, templates, config) propagate to the
 * caller. Per-emission errors are reported through the logger's
 * ErrorReporter and never reach the caller of emit().
 */

export type TaglogErrorCode =
	| 'INVALID_TAG'
	| 'RESERVED_NAME'
	| 'TEMPLATE'
	| 'SINK_WRITE'
	| 'TRACE_CAPTURE'
	| 'CONFIG';

export class TaglogError extends Error {
	readonly code: TaglogErrorCode;

	constructor(code: TaglogErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'TaglogError';
		this.code = code;
	}
}

/** A tag token is empty or contains whitespace */
export class InvalidTagError extends TaglogError {
	readonly tag: string;

	constructor(tag: string, reason: string) {
		super('INVALID_TAG', `Invalid tag ${JSON.stringify(tag)}: ${reason}`);
		this.name = 'InvalidTagError';
		this.tag = tag;
	}
}

/** A dynamic tag name collides with a real logger operation */
export class ReservedNameError extends TaglogError {
	constructor(name: string) {
		super('RESERVED_NAME', `"${name}" is a logger operation and cannot be used as a tag name`);
		this.name = 'ReservedNameError';
	}
}

/** Malformed template, unknown placeholder, bad strftime pattern, or a render failure */
export class TemplateError extends TaglogError {
	/** Formatter option the template came from, e.g. "tagsTemplate" */
	readonly option: string;

	constructor(option: string, message: string, options?: { cause?: unknown }) {
		super('TEMPLATE', `${option}: ${message}`, options);
		this.name = 'TemplateError';
		this.option = option;
	}
}

/** One or more sinks of a target could not be written */
export class SinkWriteError extends TaglogError {
	readonly sinks: string[];

	constructor(sinks: string[], options?: { cause?: unknown }) {
		super('SINK_WRITE', `Failed to write to ${sinks.join(', ')}`, options);
		this.name = 'SinkWriteError';
		this.sinks = sinks;
	}
}

/** The trace source failed; the emission continues with empty trace fields */
export class TraceCaptureError extends TaglogError {
	constructor(options?: { cause?: unknown }) {
		super('TRACE_CAPTURE', 'Failed to capture call site', options);
		this.name = 'TraceCaptureError';
	}
}

export interface ConfigIssue {
	field: string;
	message: string;
}

/** Invalid configuration document */
export class ConfigError extends TaglogError {
	readonly issues: ConfigIssue[];

	constructor(source: string, issues: ConfigIssue[]) {
		const detail = issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message));
		super('CONFIG', `Invalid config ${source}:\n  ${detail.join('\n  ')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}
