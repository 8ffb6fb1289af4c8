/**
 * Tests for TagLogger — routing, default path, sugar, trace capture and
 * failure isolation.
 */

import {
	FailingSink,
	MemorySink,
	StaticTraceSource,
	ThrowingTraceSource,
	collectErrors,
	fixedClock,
} from '@taglog/sdk';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
	InvalidTagError,
	ReservedNameError,
	SinkWriteError,
	TemplateError,
	TraceCaptureError,
} from '../errors.js';
import { Formatter } from '../formatter.js';
import { Handler } from '../handler.js';
import { TagLogger, type TagLoggerOptions } from '../logger.js';
import { Target } from '../target.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const STAMP = '[2024-01-15 10:30:45]';

function makeHandler(name: string, tags: string[], sink: MemorySink | FailingSink, formatter?: Formatter) {
	return new Handler({
		name,
		tags,
		target: new Target([sink]),
		formatter: formatter ?? new Formatter({ utc: true }),
	});
}

function makeLogger(options: TagLoggerOptions = {}) {
	const defaultSink = new MemorySink('default');
	const errors = collectErrors();
	const logger = new TagLogger({
		defaultTarget: new Target([defaultSink]),
		defaultFormatter: new Formatter({ utc: true }),
		clock: fixedClock('2024-01-15T10:30:45.123Z'),
		traceSource: new StaticTraceSource({ file: 'app.ts', line: '7', module: 'run' }),
		onError: errors.reporter,
		...options,
	});
	return { logger, defaultSink, errors };
}

afterEach(() => {
	vi.restoreAllMocks();
});

// ─── Routing ─────────────────────────────────────────────────────────────────

describe('TagLogger routing', () => {
	it('sends tagless emissions to the default sink with the default tag', () => {
		const { logger, defaultSink } = makeLogger();
		logger.log('Hello World');
		expect(defaultSink.lines).toEqual([`${STAMP}[DEFAULT] : Hello World`]);
	});

	it('treats emit without tags like log', () => {
		const { logger, defaultSink } = makeLogger();
		logger.emit('Hello World');
		expect(defaultSink.lines).toEqual([`${STAMP}[DEFAULT] : Hello World`]);
	});

	it('writes matching emissions to the handler and the default sink', () => {
		const debug = new MemorySink('debug.log');
		const { logger, defaultSink } = makeLogger({ handlers: [makeHandler('debug', ['debug'], debug)] });

		logger.emit('x', ['debug']);

		expect(debug.chunks).toEqual([`${STAMP}[DEBUG] : x\n`]);
		expect(defaultSink.lines).toEqual([`${STAMP}[DEBUG] : x`]);
	});

	it('treats a bare string as one tag', () => {
		const debug = new MemorySink('debug.log');
		const { logger, defaultSink } = makeLogger({ handlers: [makeHandler('debug', ['debug'], debug)] });

		logger.emit('x', 'debug');
		logger.emit('y', ['debug']);

		expect(debug.lines).toEqual([`${STAMP}[DEBUG] : x`, `${STAMP}[DEBUG] : y`]);
		expect(defaultSink.lines).toEqual([`${STAMP}[DEBUG] : x`, `${STAMP}[DEBUG] : y`]);
		expect(logger.matching('debug').handlers).toEqual(['debug']);
	});

	it('matches regardless of tag order and case', () => {
		const sql = new MemorySink('sql.log');
		const { logger } = makeLogger({ handlers: [makeHandler('sql', ['sql', 'blog', 'warning'], sql)] });

		logger.emit('q1', ['blog', 'sql', 'warning']);
		logger.emit('q2', ['WARNING', 'Blog', 'sql']);

		expect(sql.lines).toEqual([`${STAMP}[BLOG,SQL,WARNING] : q1`, `${STAMP}[WARNING,BLOG,SQL] : q2`]);
	});

	it('renders only the tags a handler subscribes to', () => {
		const sql = new MemorySink('sql.log');
		const { logger, defaultSink } = makeLogger({ handlers: [makeHandler('sql', ['sql'], sql)] });

		logger.emit('q', ['blog', 'sql']);

		expect(sql.lines).toEqual([`${STAMP}[SQL] : q`]);
		expect(defaultSink.lines).toEqual([`${STAMP}[BLOG,SQL] : q`]);
	});

	it('delivers to every matching handler in order', () => {
		const order: string[] = [];
		const a = new MemorySink('a');
		const b = new MemorySink('b');
		const c = new MemorySink('c');
		const { logger } = makeLogger({
			handlers: [makeHandler('a', ['info'], a), makeHandler('b', ['net'], b), makeHandler('c', ['db'], c)],
			onError: () => order.push('error'),
		});

		logger.emit('m', ['net', 'info']);

		expect(a.lines).toHaveLength(1);
		expect(b.lines).toHaveLength(1);
		expect(c.lines).toHaveLength(0);
		expect(order).toEqual([]);
	});

	it('rejects malformed tags before any handler runs', () => {
		const sink = new MemorySink();
		const { logger, defaultSink } = makeLogger({ handlers: [makeHandler('all', ['info'], sink)] });

		expect(() => logger.emit('x', ['info', 'bad tag'])).toThrow(InvalidTagError);
		expect(sink.chunks).toEqual([]);
		expect(defaultSink.chunks).toEqual([]);
	});
});

// ─── Default path ────────────────────────────────────────────────────────────

describe('default path modes', () => {
	it("'unmatched' receives only tags no handler claimed", () => {
		const sql = new MemorySink('sql.log');
		const { logger, defaultSink } = makeLogger({
			defaultPath: 'unmatched',
			handlers: [makeHandler('sql', ['sql'], sql)],
		});

		logger.emit('x', ['sql', 'blog']);
		logger.emit('y', ['sql']);

		expect(defaultSink.lines).toEqual([`${STAMP}[BLOG] : x`]);
		expect(sql.lines).toHaveLength(2);
	});

	it("'unmatched' still receives emissions no handler wants", () => {
		const { logger, defaultSink } = makeLogger({ defaultPath: 'unmatched' });
		logger.log('hi');
		expect(defaultSink.lines).toEqual([`${STAMP}[DEFAULT] : hi`]);
	});

	it("'off' never writes to the default sink", () => {
		const { logger, defaultSink } = makeLogger({ defaultPath: 'off' });
		logger.emit('x', ['info']);
		logger.log('y');
		expect(defaultSink.chunks).toEqual([]);
	});
});

// ─── Sugar ───────────────────────────────────────────────────────────────────

describe('tag-name sugar', () => {
	it('dispatch is equivalent to emit with the split name', () => {
		const viaName = new MemorySink();
		const viaEmit = new MemorySink();
		const first = makeLogger({ handlers: [makeHandler('h', ['general', 'info'], viaName)] });
		const second = makeLogger({ handlers: [makeHandler('h', ['general', 'info'], viaEmit)] });

		first.logger.dispatch('general_info', 'msg');
		second.logger.emit('msg', ['general', 'info']);

		expect(viaName.chunks).toEqual([`${STAMP}[GENERAL,INFO] : msg\n`]);
		expect(viaName.chunks).toEqual(viaEmit.chunks);
		expect(first.defaultSink.chunks).toEqual(second.defaultSink.chunks);
	});

	it('named() binds the derived tag set', () => {
		const { logger, defaultSink } = makeLogger();
		const sqlWarning = logger.named('blog_sql_warning');

		expect(sqlWarning.tags.tags).toEqual(['blog', 'sql', 'warning']);
		sqlWarning('slow');
		sqlWarning('slower');

		expect(defaultSink.lines).toEqual([
			`${STAMP}[BLOG,SQL,WARNING] : slow`,
			`${STAMP}[BLOG,SQL,WARNING] : slower`,
		]);
	});

	it('tagged() binds explicit tags', () => {
		const { logger, defaultSink } = makeLogger();
		const http = logger.tagged('net', 'http');
		http('GET /');
		expect(defaultSink.lines).toEqual([`${STAMP}[NET,HTTP] : GET /`]);
	});

	it('tagged() validates tags up front', () => {
		const { logger } = makeLogger();
		expect(() => logger.tagged('has space')).toThrow(InvalidTagError);
	});

	it('rejects names of logger operations', () => {
		const { logger, defaultSink } = makeLogger();
		expect(() => logger.dispatch('emit', 'x')).toThrow(ReservedNameError);
		expect(() => logger.named('close')).toThrow('"close" is a logger operation');
		expect(defaultSink.chunks).toEqual([]);
	});

	it('honors a custom delimiter', () => {
		const { logger, defaultSink } = makeLogger({ delimiter: '.' });
		logger.dispatch('net.http', 'ok');
		expect(defaultSink.lines).toEqual([`${STAMP}[NET,HTTP] : ok`]);
	});
});

// ─── Trace ───────────────────────────────────────────────────────────────────

describe('trace capture', () => {
	it('renders the call site for trace-tagged emissions', () => {
		const { logger, defaultSink } = makeLogger();
		logger.emit('t', ['trace']);
		expect(defaultSink.lines).toEqual([`${STAMP}app.ts:7[TRACE] : t`]);
	});

	it('does not capture without the trace tag', () => {
		const { logger, defaultSink } = makeLogger();
		logger.emit('t', ['info']);
		expect(defaultSink.lines).toEqual([`${STAMP}[INFO] : t`]);
	});

	it('appends the error stack after the message', () => {
		const { logger, defaultSink } = makeLogger();
		const error = new Error('boom');
		error.stack = 'Error: boom\n    at here (x.ts:1:1)';

		logger.emit('t', ['trace'], { error });

		expect(defaultSink.chunks).toEqual([
			`${STAMP}app.ts:7[TRACE] : t\nError: boom\n    at here (x.ts:1:1)\n`,
		]);
	});

	it('ignores the error without the trace tag', () => {
		const { logger, defaultSink } = makeLogger();
		logger.emit('t', ['info'], { error: new Error('boom') });
		expect(defaultSink.lines).toEqual([`${STAMP}[INFO] : t`]);
	});

	it('degrades to empty trace fields when capture fails', () => {
		const { logger, defaultSink, errors } = makeLogger({ traceSource: new ThrowingTraceSource() });

		logger.emit('t', ['trace']);

		expect(defaultSink.lines).toEqual([`${STAMP}[TRACE] : t`]);
		expect(errors.reports).toHaveLength(1);
		expect(errors.reports[0].error).toBeInstanceOf(TraceCaptureError);
		expect(errors.reports[0].context).toEqual({ handler: 'trace', message: 't' });
	});

	it('captures the real caller through emit and bound loggers', () => {
		const { logger, defaultSink } = makeLogger({ traceSource: undefined });
		const expected = /^\[2024-01-15 10:30:45\]logger\.test\.ts:\d+\[TRACE\] : t$/;

		function viaEmit() {
			logger.emit('t', ['trace']);
		}
		const traced = logger.tagged('trace');
		function viaBound() {
			traced('t');
		}

		viaEmit();
		viaBound();

		expect(defaultSink.lines).toHaveLength(2);
		expect(defaultSink.lines[0]).toMatch(expected);
		expect(defaultSink.lines[1]).toMatch(expected);
	});
});

// ─── Failure isolation ───────────────────────────────────────────────────────

describe('failure isolation', () => {
	it('a failing target does not stop other handlers', () => {
		const healthy = new MemorySink('healthy');
		const { logger, defaultSink, errors } = makeLogger({
			handlers: [
				makeHandler('broken', ['db'], new FailingSink('db.log')),
				makeHandler('healthy', ['db', 'audit'], healthy),
			],
		});

		expect(() => logger.emit('x', ['db'])).not.toThrow();

		expect(healthy.lines).toEqual([`${STAMP}[DB] : x`]);
		expect(defaultSink.lines).toEqual([`${STAMP}[DB] : x`]);
		expect(errors.reports).toHaveLength(1);
		expect(errors.reports[0].error).toBeInstanceOf(SinkWriteError);
		expect(errors.reports[0].context).toEqual({ handler: 'broken', message: 'x' });
	});

	it('a render failure skips only that handler', () => {
		const broken = new MemorySink('broken');
		const healthy = new MemorySink('healthy');
		const throwing = new Formatter({
			tagFormatter: () => {
				throw new Error('bad transform');
			},
		});
		const { logger, errors } = makeLogger({
			handlers: [makeHandler('broken', ['x'], broken, throwing), makeHandler('healthy', ['x'], healthy)],
		});

		logger.emit('m', ['x']);

		expect(broken.chunks).toEqual([]);
		expect(healthy.lines).toEqual([`${STAMP}[X] : m`]);
		expect(errors.reports[0].error).toBeInstanceOf(TemplateError);
	});

	it('a failing default target is reported, not thrown', () => {
		const { logger, errors } = makeLogger({ defaultTarget: new Target([new FailingSink('stdout')]) });
		logger.log('x');
		expect(errors.reports.map((r) => r.context.handler)).toEqual(['default']);
	});

	it('a throwing reporter falls back to stderr and delivery continues', () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const healthy = new MemorySink('healthy');
		const { logger } = makeLogger({
			handlers: [makeHandler('broken', ['db'], new FailingSink()), makeHandler('healthy', ['db'], healthy)],
			onError: () => {
				throw new Error('reporter down');
			},
		});

		logger.emit('x', ['db']);

		expect(healthy.lines).toHaveLength(1);
		expect(stderr).toHaveBeenCalledWith('taglog: broken: Failed to write to failing\n');
		expect(stderr).toHaveBeenCalledWith('taglog: reporter: reporter down\n');
	});

	it('reports to stderr by default', () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const logger = new TagLogger({
			handlers: [makeHandler('broken', ['db'], new FailingSink('db.log'))],
			defaultPath: 'off',
		});

		logger.emit('x', ['db']);

		expect(stderr).toHaveBeenCalledWith('taglog: broken: Failed to write to db.log\n');
	});
});

// ─── Preview and lifecycle ───────────────────────────────────────────────────

describe('matching and close', () => {
	it('previews routing', () => {
		const { logger } = makeLogger({
			defaultPath: 'unmatched',
			handlers: [
				makeHandler('sql', ['sql'], new MemorySink()),
				makeHandler('blog', ['blog'], new MemorySink()),
			],
		});

		expect(logger.matching(['sql', 'blog'])).toMatchObject({ handlers: ['sql', 'blog'], defaultPath: false });
		expect(logger.matching(['sql', 'net'])).toMatchObject({ handlers: ['sql'], defaultPath: true });
		expect(logger.matching().tags.tags).toEqual(['default']);
	});

	it('closes handler and default targets', () => {
		const handlerSink = new MemorySink();
		const { logger, defaultSink } = makeLogger({ handlers: [makeHandler('h', ['x'], handlerSink)] });
		logger.close();
		expect(handlerSink.closed).toBe(true);
		expect(defaultSink.closed).toBe(true);
	});
});
