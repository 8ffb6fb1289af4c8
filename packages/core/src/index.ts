/**
 * @taglog/core — tag-routed logging.
 */

export {
	type CreateLoggerOptions,
	createLoggerFromConfig,
	loadConfig,
	loadLogger,
	parseConfig,
	toFormatterOptions,
	validateConfig,
} from './config.js';
export { configureLogger, getLogger, resetLogger } from './default-logger.js';
export {
	type ConfigIssue,
	ConfigError,
	InvalidTagError,
	ReservedNameError,
	SinkWriteError,
	TaglogError,
	type TaglogErrorCode,
	TemplateError,
	TraceCaptureError,
} from './errors.js';
export {
	DEFAULT_FORMATTER_OPTIONS,
	type Emission,
	Formatter,
	type FormatterOptions,
	TAG_CASES,
	TEMPLATE_FIELDS,
	type TagTransform,
} from './formatter.js';
export { Handler, type HandlerOptions } from './handler.js';
export {
	DEFAULT_HANDLER_NAME,
	type EmitOptions,
	RESERVED_NAMES,
	type RoutePreview,
	TagLogger,
	type TagLoggerOptions,
	type TaggedLog,
	reportToStderr,
} from './logger.js';
export { FileSink, StreamSink, stderrSink, stdoutSink } from './sinks.js';
export { strftime, validateStrftime } from './strftime.js';
export { DEFAULT_TAG, TRACE_TAG, type TagInput, TagSet, matches, sharedTags } from './tags.js';
export { type CreateTargetOptions, Target, createTarget } from './target.js';
export { type CompiledTemplate, compileTemplate } from './template.js';
export { NoTraceSource, StackTraceSource, formatErrorStack, parseStackFrame } from './trace.js';
