/**
 * Tag sets and subscription matching.
 *
 * A handler's subscription is "any of": an emission reaches the handler
 * when the two tag sets share at least one tag.
 */

import { InvalidTagError } from './errors.js';

/** Synthesized for emissions that carry no tags */
export const DEFAULT_TAG = 'default';

/** Requests call-site capture in addition to matching like any other tag */
export const TRACE_TAG = 'trace';

const WHITESPACE_RE = /\s/;

/** One tag, or a collection of tags; a bare string is a single tag */
export type TagInput = string | Iterable<string>;

function normalizeTag(token: string): string {
	if (typeof token !== 'string' || token.length === 0) {
		throw new InvalidTagError(String(token), 'tags must be non-empty strings');
	}
	if (WHITESPACE_RE.test(token)) {
		throw new InvalidTagError(token, 'tags must be a single word');
	}
	return token.toLowerCase();
}

// ─── TagSet ───────────────────────────────────────────────────────────────────

export class TagSet implements Iterable<string> {
	/** Lowercase tags in first-occurrence order */
	readonly tags: readonly string[];
	private readonly lookup: ReadonlySet<string>;

	private constructor(tags: string[]) {
		this.tags = Object.freeze(tags);
		this.lookup = new Set(tags);
	}

	/**
	 * Build a tag set from explicit tokens. A string is one token, never
	 * split into characters.
	 * Throws InvalidTagError for empty tokens or tokens containing whitespace.
	 */
	static from(tokens: TagInput): TagSet {
		const seen = new Set<string>();
		const ordered: string[] = [];
		for (const token of typeof tokens === 'string' ? [tokens] : tokens) {
			const tag = normalizeTag(token);
			if (!seen.has(tag)) {
				seen.add(tag);
				ordered.push(tag);
			}
		}
		return new TagSet(ordered);
	}

	/**
	 * Derive a tag set from a name such as `blog_sql_warning`.
	 * Empty segments are dropped; a name with no segments is rejected.
	 */
	static fromName(name: string, delimiter = '_'): TagSet {
		const tokens = name.split(delimiter).filter((t) => t.length > 0);
		if (tokens.length === 0) {
			throw new InvalidTagError(name, 'name contains no tags');
		}
		return TagSet.from(tokens);
	}

	/** Tag set for an emission: `{default}` when no tokens are given */
	static forEmission(tokens: TagInput = []): TagSet {
		const set = TagSet.from(tokens);
		return set.size === 0 ? new TagSet([DEFAULT_TAG]) : set;
	}

	get size(): number {
		return this.tags.length;
	}

	has(tag: string): boolean {
		return this.lookup.has(tag.toLowerCase());
	}

	[Symbol.iterator](): Iterator<string> {
		return this.tags[Symbol.iterator]();
	}

	toString(): string {
		return `{${this.tags.join(', ')}}`;
	}
}

// ─── Matching ─────────────────────────────────────────────────────────────────

/**
 * True iff the two tag sets share at least one tag.
 * An empty set matches nothing.
 */
export function matches(emission: TagSet, subscription: TagSet): boolean {
	const [small, large] =
		emission.size <= subscription.size ? [emission, subscription] : [subscription, emission];
	for (const tag of small) {
		if (large.has(tag)) return true;
	}
	return false;
}

/** Tags of the emission that the subscription listens for, in emission order */
export function sharedTags(emission: TagSet, subscription: TagSet): string[] {
	return emission.tags.filter((tag) => subscription.has(tag));
}
