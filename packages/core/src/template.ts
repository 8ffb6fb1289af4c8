/**
 * Named-placeholder templates.
 *
 * `{name}` is substituted; `{{` and `}}` render literal braces. Templates
 * are parsed once and checked against the fields their stage supplies.
 */

import { TemplateError } from './errors.js';

type Part = { kind: 'text'; text: string } | { kind: 'field'; name: string };

export interface CompiledTemplate {
	readonly source: string;
	/** Placeholder names in order of appearance */
	readonly fields: readonly string[];
	/** Missing values render as empty strings */
	render(values: Readonly<Record<string, string | undefined>>): string;
}

function parse(option: string, source: string): Part[] {
	const parts: Part[] = [];
	let text = '';
	let i = 0;

	while (i < source.length) {
		const ch = source[i];

		if (ch === '{') {
			if (source[i + 1] === '{') {
				text += '{';
				i += 2;
				continue;
			}
			const close = source.indexOf('}', i + 1);
			if (close === -1) {
				throw new TemplateError(option, `unterminated "{" at position ${i} in "${source}"`);
			}
			const name = source.slice(i + 1, close);
			if (name.length === 0) {
				throw new TemplateError(option, `empty placeholder at position ${i} in "${source}"`);
			}
			if (name.includes('{')) {
				throw new TemplateError(option, `nested "{" at position ${i} in "${source}"`);
			}
			if (text) parts.push({ kind: 'text', text });
			text = '';
			parts.push({ kind: 'field', name });
			i = close + 1;
			continue;
		}

		if (ch === '}') {
			if (source[i + 1] === '}') {
				text += '}';
				i += 2;
				continue;
			}
			throw new TemplateError(option, `single "}" at position ${i} in "${source}"`);
		}

		text += ch;
		i++;
	}

	if (text) parts.push({ kind: 'text', text });
	return parts;
}

/**
 * Parse a template and check its placeholders against `allowed`.
 * Throws TemplateError naming `option` for syntax errors or unknown fields.
 */
export function compileTemplate(
	option: string,
	source: string,
	allowed: readonly string[],
): CompiledTemplate {
	const parts = parse(option, source);
	const fields: string[] = [];

	for (const part of parts) {
		if (part.kind !== 'field') continue;
		if (!allowed.includes(part.name)) {
			throw new TemplateError(
				option,
				`unknown placeholder {${part.name}} (available: ${allowed.map((a) => `{${a}}`).join(', ')})`,
			);
		}
		fields.push(part.name);
	}

	return {
		source,
		fields,
		render(values) {
			let out = '';
			for (const part of parts) {
				out += part.kind === 'text' ? part.text : (values[part.name] ?? '');
			}
			return out;
		},
	};
}
