/**
 * strftime-style date formatting.
 */

import { TemplateError } from './errors.js';

const DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
	'January',
	'February',
	'March',
	'April',
	'May',
	'June',
	'July',
	'August',
	'September',
	'October',
	'November',
	'December',
];

const DIRECTIVES = new Set('YymdeHIMSfLpjaAbBzZs%');

function pad(value: number, width = 2, fill = '0'): string {
	return String(value).padStart(width, fill);
}

interface DateParts {
	year: number;
	month: number;
	day: number;
	weekday: number;
	hours: number;
	minutes: number;
	seconds: number;
	millis: number;
	/** Minutes east of UTC */
	offset: number;
}

function partsOf(date: Date, utc: boolean): DateParts {
	if (utc) {
		return {
			year: date.getUTCFullYear(),
			month: date.getUTCMonth(),
			day: date.getUTCDate(),
			weekday: date.getUTCDay(),
			hours: date.getUTCHours(),
			minutes: date.getUTCMinutes(),
			seconds: date.getUTCSeconds(),
			millis: date.getUTCMilliseconds(),
			offset: 0,
		};
	}
	return {
		year: date.getFullYear(),
		month: date.getMonth(),
		day: date.getDate(),
		weekday: date.getDay(),
		hours: date.getHours(),
		minutes: date.getMinutes(),
		seconds: date.getSeconds(),
		millis: date.getMilliseconds(),
		offset: -date.getTimezoneOffset(),
	};
}

function dayOfYear(p: DateParts): number {
	const start = Date.UTC(p.year, 0, 1);
	const current = Date.UTC(p.year, p.month, p.day);
	return Math.floor((current - start) / 86_400_000) + 1;
}

function formatOffset(offset: number): string {
	const sign = offset < 0 ? '-' : '+';
	const abs = Math.abs(offset);
	return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

function directive(code: string, date: Date, p: DateParts, utc: boolean): string {
	switch (code) {
		case 'Y':
			return String(p.year);
		case 'y':
			return pad(p.year % 100);
		case 'm':
			return pad(p.month + 1);
		case 'd':
			return pad(p.day);
		case 'e':
			return pad(p.day, 2, ' ');
		case 'H':
			return pad(p.hours);
		case 'I':
			return pad(p.hours % 12 === 0 ? 12 : p.hours % 12);
		case 'M':
			return pad(p.minutes);
		case 'S':
			return pad(p.seconds);
		case 'f':
			return pad(p.millis * 1000, 6);
		case 'L':
			return pad(p.millis, 3);
		case 'p':
			return p.hours < 12 ? 'AM' : 'PM';
		case 'j':
			return pad(dayOfYear(p), 3);
		case 'a':
			return DAYS[p.weekday].slice(0, 3);
		case 'A':
			return DAYS[p.weekday];
		case 'b':
			return MONTHS[p.month].slice(0, 3);
		case 'B':
			return MONTHS[p.month];
		case 'z':
			return formatOffset(p.offset);
		case 'Z':
			return utc ? 'UTC' : formatOffset(p.offset);
		case 's':
			return String(Math.floor(date.getTime() / 1000));
		default:
			return '%';
	}
}

/**
 * Check a pattern for unknown directives.
 * `option` names the formatter option in the error.
 */
export function validateStrftime(option: string, pattern: string): void {
	for (let i = 0; i < pattern.length; i++) {
		if (pattern[i] !== '%') continue;
		const code = pattern[i + 1];
		if (code === undefined) {
			throw new TemplateError(option, `trailing "%" in "${pattern}"`);
		}
		if (!DIRECTIVES.has(code)) {
			throw new TemplateError(option, `unknown directive %${code} in "${pattern}"`);
		}
		i++;
	}
}

/**
 * Format a date with a strftime pattern, in local time unless `utc`.
 * Assumes the pattern passed validateStrftime.
 */
export function strftime(date: Date, pattern: string, utc = false): string {
	const p = partsOf(date, utc);
	let out = '';
	for (let i = 0; i < pattern.length; i++) {
		const ch = pattern[i];
		if (ch === '%' && i + 1 < pattern.length) {
			out += directive(pattern[i + 1], date, p, utc);
			i++;
		} else {
			out += ch;
		}
	}
	return out;
}
