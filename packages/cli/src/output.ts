/**
 * Output formatting utilities for the CLI.
 *
 * stdout belongs to the routed log lines, so everything the CLI says about
 * itself goes to stderr. JSON results are the exception.
 */

import chalk from 'chalk';

// ─── Global output state ─────────────────────────────────────────────────────

let jsonMode = false;
let quietMode = false;

export function setJsonMode(enabled: boolean): void {
	jsonMode = enabled;
}

export function setQuietMode(enabled: boolean): void {
	quietMode = enabled;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

// ─── Basic output ────────────────────────────────────────────────────────────

export function info(message: string): void {
	if (quietMode || jsonMode) return;
	console.error(message);
}

export function success(message: string): void {
	if (quietMode || jsonMode) return;
	console.error(chalk.green(`  ✓ ${message}`));
}

export function error(message: string): void {
	if (jsonMode) return;
	console.error(chalk.red(`  ✗ ${message}`));
}

export function warn(message: string): void {
	if (quietMode || jsonMode) return;
	console.error(chalk.yellow(`  ! ${message}`));
}

export function heading(text: string): void {
	if (quietMode || jsonMode) return;
	console.error(chalk.bold(text));
}

// ─── JSON output ─────────────────────────────────────────────────────────────

export function json(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

// ─── Table formatting ────────────────────────────────────────────────────────

export interface TableColumn {
	header: string;
	key: string;
	width?: number;
	align?: 'left' | 'right';
}

export function formatTable(columns: TableColumn[], rows: Record<string, string>[]): string[] {
	const widths = columns.map((col) => {
		const maxDataLen = rows.reduce((max, row) => Math.max(max, (row[col.key] ?? '').length), 0);
		return col.width ?? Math.max(col.header.length, maxDataLen) + 2;
	});

	const lines = [`  ${columns.map((col, i) => col.header.padEnd(widths[i])).join('').trimEnd()}`];
	for (const row of rows) {
		const line = columns
			.map((col, i) => {
				const val = row[col.key] ?? '';
				return col.align === 'right' ? val.padStart(widths[i]) : val.padEnd(widths[i]);
			})
			.join('');
		lines.push(`  ${line.trimEnd()}`);
	}
	return lines;
}

export function table(columns: TableColumn[], rows: Record<string, string>[]): void {
	if (jsonMode) {
		json(rows);
		return;
	}
	if (quietMode) return;

	const [header, ...body] = formatTable(columns, rows);
	console.error(chalk.dim(header));
	for (const line of body) {
		console.error(line);
	}
}
