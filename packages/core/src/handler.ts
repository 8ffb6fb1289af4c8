/**
 * Handlers bind a tag subscription to a formatter and a target.
 */

import { type Emission, Formatter } from './formatter.js';
import { type TagInput, TagSet, matches, sharedTags } from './tags.js';
import type { Target } from './target.js';

export interface HandlerOptions {
	/** Used in error reports and the {handler} placeholder only */
	name: string;
	/** Subscription; the handler receives emissions sharing any of these */
	tags: TagInput;
	target: Target;
	formatter?: Formatter;
}

export class Handler {
	readonly name: string;
	readonly tags: TagSet;
	readonly target: Target;
	readonly formatter: Formatter;

	constructor(options: HandlerOptions) {
		this.name = options.name;
		this.tags = TagSet.from(options.tags);
		this.target = options.target;
		this.formatter = options.formatter ?? new Formatter();
	}

	accepts(tags: TagSet): boolean {
		return matches(tags, this.tags);
	}

	/**
	 * Render the emission with the tags this handler listens for and write
	 * it. Throws TemplateError or SinkWriteError.
	 */
	handle(emission: Emission): void {
		const line = this.formatter.formatLine(
			emission,
			sharedTags(emission.tags, this.tags),
			this.name,
		);
		this.target.write(`${line}\n`);
	}
}
