/**
 * @taglog/sdk — contracts shared by taglog packages and sink authors.
 */

export type {
	CallSite,
	Clock,
	DefaultConfig,
	DefaultPathMode,
	ErrorContext,
	ErrorReporter,
	FormatterConfig,
	HandlerConfig,
	Sink,
	TagCase,
	TaglogConfig,
	TargetConfig,
	TraceSource,
} from './types.js';

export {
	FailingSink,
	MemorySink,
	StaticTraceSource,
	ThrowingTraceSource,
	collectErrors,
	fixedClock,
} from './testing.js';
