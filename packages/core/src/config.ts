/**
 * YAML configuration — declare handlers, targets and formatters in a file.
 *
 *   default:
 *     mode: unmatched
 *     target: { stdout: true }
 *   handlers:
 *     - name: sql
 *       tags: [sql, blog, warning]
 *       target: { filename: logs/sql.log }
 *       formatter: { tag_case: lower, tag_delimiter: ", " }
 *
 * Every problem in a document is collected and reported in one ConfigError.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type {
	Clock,
	DefaultConfig,
	DefaultPathMode,
	ErrorReporter,
	FormatterConfig,
	HandlerConfig,
	Sink,
	TagCase,
	TaglogConfig,
	TargetConfig,
	TraceSource,
} from '@taglog/sdk';
import yaml from 'js-yaml';
import { type ConfigIssue, ConfigError, InvalidTagError } from './errors.js';
import { Formatter, type FormatterOptions, TAG_CASES } from './formatter.js';
import { Handler } from './handler.js';
import { TagLogger } from './logger.js';
import { TagSet } from './tags.js';
import { createTarget } from './target.js';

const DEFAULT_PATH_MODES: readonly DefaultPathMode[] = ['always', 'unmatched', 'off'];

const STRING_FORMATTER_KEYS = [
	'template',
	'tags_template',
	'tag_template',
	'tag_delimiter',
	'date_template',
	'date_format',
	'time_template',
	'time_format',
	'datetime_template',
	'file_template',
	'line_template',
	'module_template',
	'trace_template',
] as const;

type StringFormatterKey = (typeof STRING_FORMATTER_KEYS)[number];

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isStringFormatterKey(key: string): key is StringFormatterKey {
	return (STRING_FORMATTER_KEYS as readonly string[]).includes(key);
}

function isTagCase(value: unknown): value is TagCase {
	return typeof value === 'string' && Object.hasOwn(TAG_CASES, value);
}

function isDefaultPathMode(value: unknown): value is DefaultPathMode {
	return typeof value === 'string' && (DEFAULT_PATH_MODES as readonly string[]).includes(value);
}

// ─── Section parsers ──────────────────────────────────────────────────────────

function parseTarget(value: unknown, field: string, issues: ConfigIssue[]): TargetConfig {
	const target: TargetConfig = {};
	if (!isRecord(value)) {
		issues.push({ field, message: 'target must be an object' });
		return target;
	}
	for (const [key, v] of Object.entries(value)) {
		if (key === 'filename') {
			if (typeof v === 'string' && v.length > 0) target.filename = v;
			else issues.push({ field: `${field}.filename`, message: 'filename must be a non-empty string' });
		} else if (key === 'stdout' || key === 'stderr') {
			if (typeof v === 'boolean') target[key] = v;
			else issues.push({ field: `${field}.${key}`, message: `${key} must be a boolean` });
		} else {
			issues.push({ field: `${field}.${key}`, message: 'unknown target option' });
		}
	}
	return target;
}

function parseFormatter(value: unknown, field: string, issues: ConfigIssue[]): FormatterConfig {
	const formatter: FormatterConfig = {};
	if (!isRecord(value)) {
		issues.push({ field, message: 'formatter must be an object' });
		return formatter;
	}
	for (const [key, v] of Object.entries(value)) {
		if (isStringFormatterKey(key)) {
			if (typeof v === 'string') formatter[key] = v;
			else issues.push({ field: `${field}.${key}`, message: `${key} must be a string` });
		} else if (key === 'tag_case') {
			if (isTagCase(v)) formatter.tag_case = v;
			else
				issues.push({
					field: `${field}.tag_case`,
					message: `tag_case must be one of: ${Object.keys(TAG_CASES).join(', ')}`,
				});
		} else if (key === 'utc') {
			if (typeof v === 'boolean') formatter.utc = v;
			else issues.push({ field: `${field}.utc`, message: 'utc must be a boolean' });
		} else {
			issues.push({ field: `${field}.${key}`, message: 'unknown formatter option' });
		}
	}
	return formatter;
}

function parseTags(value: unknown, field: string, issues: ConfigIssue[]): string[] {
	if (!Array.isArray(value) || value.length === 0) {
		issues.push({ field, message: 'tags must be a non-empty list' });
		return [];
	}
	const tags: string[] = [];
	value.forEach((tag: unknown, i) => {
		if (typeof tag !== 'string') {
			issues.push({ field: `${field}[${i}]`, message: 'tag must be a string' });
			return;
		}
		try {
			TagSet.from([tag]);
			tags.push(tag);
		} catch (err) {
			if (!(err instanceof InvalidTagError)) throw err;
			issues.push({ field: `${field}[${i}]`, message: err.message });
		}
	});
	return tags;
}

function parseHandler(value: unknown, field: string, issues: ConfigIssue[]): HandlerConfig {
	const handler: HandlerConfig = { name: '', tags: [], target: {} };
	if (!isRecord(value)) {
		issues.push({ field, message: 'handler must be an object' });
		return handler;
	}

	if (typeof value.name === 'string' && value.name.length > 0) handler.name = value.name;
	else issues.push({ field: `${field}.name`, message: 'name must be a non-empty string' });

	handler.tags = parseTags(value.tags, `${field}.tags`, issues);

	if (value.target === undefined) issues.push({ field: `${field}.target`, message: 'target is required' });
	else handler.target = parseTarget(value.target, `${field}.target`, issues);

	if (value.formatter !== undefined) {
		handler.formatter = parseFormatter(value.formatter, `${field}.formatter`, issues);
	}

	for (const key of Object.keys(value)) {
		if (!['name', 'tags', 'target', 'formatter'].includes(key)) {
			issues.push({ field: `${field}.${key}`, message: 'unknown handler option' });
		}
	}
	return handler;
}

function parseDefault(value: unknown, issues: ConfigIssue[]): DefaultConfig {
	const def: DefaultConfig = {};
	if (!isRecord(value)) {
		issues.push({ field: 'default', message: 'default must be an object' });
		return def;
	}
	for (const [key, v] of Object.entries(value)) {
		if (key === 'mode') {
			if (isDefaultPathMode(v)) def.mode = v;
			else
				issues.push({
					field: 'default.mode',
					message: `mode must be one of: ${DEFAULT_PATH_MODES.join(', ')}`,
				});
		} else if (key === 'target') {
			def.target = parseTarget(v, 'default.target', issues);
		} else if (key === 'formatter') {
			def.formatter = parseFormatter(v, 'default.formatter', issues);
		} else {
			issues.push({ field: `default.${key}`, message: 'unknown default option' });
		}
	}
	return def;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Validate a parsed document and return it typed.
 * Throws ConfigError listing every problem found.
 */
export function validateConfig(doc: unknown, source = '<inline>'): TaglogConfig {
	const issues: ConfigIssue[] = [];
	const config: TaglogConfig = { handlers: [] };

	// An empty file is an empty config
	if (doc === undefined || doc === null) return config;

	if (!isRecord(doc)) {
		throw new ConfigError(source, [{ field: '', message: 'config must be a mapping' }]);
	}

	if (doc.default !== undefined) config.default = parseDefault(doc.default, issues);

	if (doc.handlers !== undefined) {
		if (!Array.isArray(doc.handlers)) {
			issues.push({ field: 'handlers', message: 'handlers must be a list' });
		} else {
			const names = new Set<string>();
			doc.handlers.forEach((entry: unknown, i) => {
				const handler = parseHandler(entry, `handlers[${i}]`, issues);
				if (handler.name && names.has(handler.name)) {
					issues.push({ field: `handlers[${i}].name`, message: `duplicate handler name "${handler.name}"` });
				}
				names.add(handler.name);
				config.handlers.push(handler);
			});
		}
	}

	for (const key of Object.keys(doc)) {
		if (key !== 'default' && key !== 'handlers') {
			issues.push({ field: key, message: 'unknown top-level key' });
		}
	}

	if (issues.length > 0) throw new ConfigError(source, issues);
	return config;
}

/** Parse and validate YAML text */
export function parseConfig(text: string, source = '<inline>'): TaglogConfig {
	let doc: unknown;
	try {
		doc = yaml.load(text);
	} catch (err) {
		throw new ConfigError(source, [
			{ field: '', message: `invalid YAML: ${err instanceof Error ? err.message : String(err)}` },
		]);
	}
	return validateConfig(doc, source);
}

/** Read, parse and validate a config file */
export async function loadConfig(path: string): Promise<TaglogConfig> {
	const text = await readFile(path, 'utf-8');
	return parseConfig(text, path);
}

/** Map file-style formatter keys onto Formatter options */
export function toFormatterOptions(config: FormatterConfig = {}): Partial<FormatterOptions> {
	return {
		template: config.template,
		tagsTemplate: config.tags_template,
		tagTemplate: config.tag_template,
		tagFormatter: config.tag_case ? TAG_CASES[config.tag_case] : undefined,
		tagDelimiter: config.tag_delimiter,
		dateTemplate: config.date_template,
		dateFormat: config.date_format,
		timeTemplate: config.time_template,
		timeFormat: config.time_format,
		datetimeTemplate: config.datetime_template,
		fileTemplate: config.file_template,
		lineTemplate: config.line_template,
		moduleTemplate: config.module_template,
		traceTemplate: config.trace_template,
		utc: config.utc,
	};
}

export interface CreateLoggerOptions {
	/** Relative filenames resolve against this directory (default: cwd) */
	baseDir?: string;
	clock?: Clock;
	traceSource?: TraceSource;
	onError?: ErrorReporter;
	/** Extra sinks for the default target, e.g. a MemorySink in tests */
	defaultSinks?: Sink[];
}

/**
 * Build a logger from a validated config.
 * Throws TemplateError for a bad template or date pattern.
 */
export function createLoggerFromConfig(
	config: TaglogConfig,
	options: CreateLoggerOptions = {},
): TagLogger {
	const { baseDir } = options;
	const handlers = config.handlers.map(
		(h) =>
			new Handler({
				name: h.name,
				tags: h.tags,
				target: createTarget(h.target, { baseDir }),
				formatter: new Formatter(toFormatterOptions(h.formatter)),
			}),
	);

	const def = config.default ?? {};
	return new TagLogger({
		handlers,
		defaultTarget: createTarget(def.target ?? { stdout: true }, {
			baseDir,
			extraSinks: options.defaultSinks,
		}),
		defaultFormatter: new Formatter(toFormatterOptions(def.formatter)),
		defaultPath: def.mode,
		clock: options.clock,
		traceSource: options.traceSource,
		onError: options.onError,
	});
}

/** Load a config file and build a logger; relative files resolve beside the config */
export async function loadLogger(
	path: string,
	options: Omit<CreateLoggerOptions, 'baseDir'> = {},
): Promise<TagLogger> {
	const config = await loadConfig(path);
	return createLoggerFromConfig(config, { ...options, baseDir: dirname(resolve(path)) });
}
