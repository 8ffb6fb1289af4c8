/**
 * Terminal output for the CLI.
 *
 * One mode for the whole run: human text, JSON documents only, or quiet
 * (errors only). Errors go to stderr in text and quiet modes.
 */

import chalk from 'chalk';

export type OutputMode = 'text' | 'json' | 'quiet';

let mode: OutputMode = 'text';

export function setMode(next: OutputMode): void {
	mode = next;
}

export function isJsonMode(): boolean {
	return mode === 'json';
}

function chatty(): boolean {
	return mode === 'text';
}

// ─── Status lines ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (chatty()) console.log(message);
}

export function success(message: string): void {
	if (chatty()) console.log(chalk.green(`  ✓ ${message}`));
}

export function warn(message: string): void {
	if (chatty()) console.warn(chalk.yellow(`  ! ${message}`));
}

export function error(message: string): void {
	if (mode !== 'json') console.error(chalk.red(`  ✗ ${message}`));
}

export function heading(text: string): void {
	if (chatty()) console.log(chalk.bold(text));
}

/** One routing decision: `►` when the destination receives the emission */
export function route(destination: string, receives: boolean): void {
	if (!chatty()) return;
	console.log(receives ? chalk.cyan(`    ► ${destination}`) : chalk.dim(`    - ${destination}`));
}

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Tables ──────────────────────────────────────────────────────────────────

export interface TableColumn<K extends string> {
	header: string;
	key: K;
}

/** Left-aligned columns, each two wider than its longest cell */
export function table<K extends string>(columns: TableColumn<K>[], rows: Record<K, string>[]): void {
	if (!chatty()) return;
	const widths = columns.map((col) =>
		rows.reduce((max, row) => Math.max(max, row[col.key].length), col.header.length) + 2,
	);
	const render = (cells: string[]) => `  ${cells.map((cell, i) => cell.padEnd(widths[i])).join('').trimEnd()}`;

	console.log(chalk.dim(render(columns.map((col) => col.header))));
	for (const row of rows) console.log(render(columns.map((col) => row[col.key])));
}
