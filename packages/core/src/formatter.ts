/**
 * Three-stage prefix renderer.
 *
 *   item        each tag, the date, the time, trace file/line/module
 *   item group  tags joined + wrapped, date+time, trace parts combined
 *   line        the top-level template over the groups
 *
 * Every template is compiled when the formatter is built. Rendering is a
 * pure function of the emission and the options.
 */

import type { CallSite, TagCase } from '@taglog/sdk';
import { TaglogError, TemplateError } from './errors.js';
import { strftime, validateStrftime } from './strftime.js';
import type { TagSet } from './tags.js';
import { type CompiledTemplate, compileTemplate } from './template.js';

// ─── Emission ─────────────────────────────────────────────────────────────────

/** One logging event, as seen by formatters and handlers */
export interface Emission {
	message: string;
	tags: TagSet;
	timestamp: Date;
	/** Present for `trace`-tagged emissions when a call site was captured */
	trace?: CallSite;
	/** Formatted error stack attached to `trace`-tagged emissions */
	errorStack?: string;
}

// ─── Options ──────────────────────────────────────────────────────────────────

export type TagTransform = (tag: string) => string;

export interface FormatterOptions {
	/** Line template: {datetime} {trace} {tags} {handler} */
	template: string;
	/** Tag group template: {tags} */
	tagsTemplate: string;
	/** Per-tag template: {tag} */
	tagTemplate: string;
	/** Applied to each tag before tagTemplate */
	tagFormatter: TagTransform;
	tagDelimiter: string;
	/** Date item template: {date} */
	dateTemplate: string;
	/** strftime pattern for {date} */
	dateFormat: string;
	/** Time item template: {time} */
	timeTemplate: string;
	/** strftime pattern for {time} */
	timeFormat: string;
	/** Date/time group template: {date} {time} */
	datetimeTemplate: string;
	fileTemplate: string;
	lineTemplate: string;
	moduleTemplate: string;
	/** Trace group template: {file} {line} {module} */
	traceTemplate: string;
	/** Render date and time in UTC instead of local time */
	utc: boolean;
}

export const TAG_CASES: Readonly<Record<TagCase, TagTransform>> = {
	upper: (tag) => tag.toUpperCase().trim(),
	lower: (tag) => tag.toLowerCase().trim(),
	capitalize: (tag) => {
		const t = tag.trim();
		return t.charAt(0).toUpperCase() + t.slice(1).toLowerCase();
	},
	none: (tag) => tag,
};

export const DEFAULT_FORMATTER_OPTIONS: Readonly<FormatterOptions> = Object.freeze({
	template: '{datetime}{trace}{tags} : ',
	tagsTemplate: '[{tags}]',
	tagTemplate: '{tag}',
	tagFormatter: TAG_CASES.upper,
	tagDelimiter: ',',
	dateTemplate: '{date}',
	dateFormat: '%Y-%m-%d',
	timeTemplate: '{time}',
	timeFormat: '%H:%M:%S',
	datetimeTemplate: '[{date} {time}]',
	fileTemplate: '{file}',
	lineTemplate: ':{line}',
	moduleTemplate: ':{module}',
	traceTemplate: '{file}{line}',
	utc: false,
});

type TemplateOption =
	| 'template'
	| 'tagsTemplate'
	| 'tagTemplate'
	| 'dateTemplate'
	| 'timeTemplate'
	| 'datetimeTemplate'
	| 'fileTemplate'
	| 'lineTemplate'
	| 'moduleTemplate'
	| 'traceTemplate';

/** Placeholders each template may use */
export const TEMPLATE_FIELDS: Readonly<Record<TemplateOption, readonly string[]>> = {
	template: ['datetime', 'trace', 'tags', 'handler'],
	tagsTemplate: ['tags'],
	tagTemplate: ['tag'],
	dateTemplate: ['date'],
	timeTemplate: ['time'],
	datetimeTemplate: ['date', 'time'],
	fileTemplate: ['file'],
	lineTemplate: ['line'],
	moduleTemplate: ['module'],
	traceTemplate: ['file', 'line', 'module'],
};

// ─── Formatter ────────────────────────────────────────────────────────────────

export class Formatter {
	readonly options: Readonly<FormatterOptions>;
	private readonly compiled: Readonly<Record<TemplateOption, CompiledTemplate>>;

	/**
	 * Throws TemplateError if any template or strftime pattern is invalid.
	 */
	constructor(overrides: Partial<FormatterOptions> = {}) {
		const options: FormatterOptions = { ...DEFAULT_FORMATTER_OPTIONS };
		for (const [key, value] of Object.entries(overrides)) {
			// Explicit undefined keeps the default
			if (value !== undefined) Object.assign(options, { [key]: value });
		}
		this.options = Object.freeze(options);

		const compile = (option: TemplateOption) =>
			compileTemplate(option, options[option], TEMPLATE_FIELDS[option]);

		this.compiled = Object.freeze({
			template: compile('template'),
			tagsTemplate: compile('tagsTemplate'),
			tagTemplate: compile('tagTemplate'),
			dateTemplate: compile('dateTemplate'),
			timeTemplate: compile('timeTemplate'),
			datetimeTemplate: compile('datetimeTemplate'),
			fileTemplate: compile('fileTemplate'),
			lineTemplate: compile('lineTemplate'),
			moduleTemplate: compile('moduleTemplate'),
			traceTemplate: compile('traceTemplate'),
		});

		validateStrftime('dateFormat', options.dateFormat);
		validateStrftime('timeFormat', options.timeFormat);
	}

	private renderTags(tags: readonly string[]): string {
		const { tagFormatter, tagDelimiter } = this.options;
		const items = tags.map((tag) => this.compiled.tagTemplate.render({ tag: tagFormatter(tag) }));
		return this.compiled.tagsTemplate.render({ tags: items.join(tagDelimiter) });
	}

	private renderDatetime(timestamp: Date): string {
		const { dateFormat, timeFormat, utc } = this.options;
		const date = this.compiled.dateTemplate.render({ date: strftime(timestamp, dateFormat, utc) });
		const time = this.compiled.timeTemplate.render({ time: strftime(timestamp, timeFormat, utc) });
		return this.compiled.datetimeTemplate.render({ date, time });
	}

	private renderTrace(site: CallSite | undefined): string {
		if (!site || (!site.file && !site.line && !site.module)) return '';
		return this.compiled.traceTemplate.render({
			file: this.compiled.fileTemplate.render({ file: site.file }),
			line: this.compiled.lineTemplate.render({ line: site.line }),
			module: this.compiled.moduleTemplate.render({ module: site.module }),
		});
	}

	/**
	 * Render the prefix for an emission.
	 *
	 * @param tags - the tags to show; defaults to all emission tags
	 * @param handler - value for the {handler} placeholder
	 */
	prefix(emission: Emission, tags: readonly string[] = emission.tags.tags, handler = ''): string {
		try {
			return this.compiled.template.render({
				datetime: this.renderDatetime(emission.timestamp),
				trace: this.renderTrace(emission.trace),
				tags: this.renderTags(tags),
				handler,
			});
		} catch (err) {
			if (err instanceof TaglogError) throw err;
			throw new TemplateError('render', err instanceof Error ? err.message : String(err), {
				cause: err,
			});
		}
	}

	/**
	 * Prefix + message, followed by the error stack block when present.
	 * No trailing newline.
	 */
	formatLine(emission: Emission, tags?: readonly string[], handler = ''): string {
		const line = this.prefix(emission, tags, handler) + emission.message;
		return emission.errorStack ? `${line}\n${emission.errorStack}` : line;
	}
}
