/**
 * chanlog inspect: show the channel files for a base path.
 */

import { readFile, stat } from 'node:fs/promises';
import { FILE_BANNER, channelFilePath } from '@chanlog/core';
import { CHANNELS, channelName, policyOf } from '@chanlog/sdk';
import type { Command } from 'commander';
import { loadCliConfig } from '../config.js';
import * as output from '../output.js';

export interface ChannelFileInfo {
	channel: string;
	path: string;
	exists: boolean;
	size: number;
	/** Timestamp from the file banner, or null if the file has none */
	created: string | null;
}

function bannerTime(content: string): string | null {
	if (!content.startsWith(FILE_BANNER)) return null;
	const end = content.indexOf('\n');
	return content.slice(FILE_BANNER.length, end === -1 ? undefined : end).trim();
}

/** Describe the file of every channel that persists. */
export async function inspectChannels(basePath: string): Promise<ChannelFileInfo[]> {
	const rows: ChannelFileInfo[] = [];
	for (const channel of CHANNELS) {
		const { fileExtension } = policyOf(channel);
		if (fileExtension === null) continue;

		const path = channelFilePath(basePath, fileExtension);
		try {
			const info = await stat(path);
			const content = await readFile(path, 'utf-8');
			rows.push({ channel: channelName(channel), path, exists: true, size: info.size, created: bannerTime(content) });
		} catch (err) {
			if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
			rows.push({ channel: channelName(channel), path, exists: false, size: 0, created: null });
		}
	}
	return rows;
}

export function registerInspectCommand(program: Command): void {
	program
		.command('inspect')
		.description('Show the channel files for a base path')
		.argument('[base]', 'Base path (default: from config)')
		.action(async (base: string | undefined, _opts: unknown, cmd: Command) => {
			try {
				const globalOpts = cmd.parent?.opts() ?? {};
				const config = await loadCliConfig({ configPath: globalOpts.config as string | undefined });
				const rows = await inspectChannels(base ?? config.base);

				if (output.isJsonMode()) {
					output.json(rows);
					return;
				}

				output.heading(`Channel files for ${base ?? config.base}`);
				output.table(
					[
						{ header: 'CHANNEL', key: 'channel' },
						{ header: 'FILE', key: 'path' },
						{ header: 'SIZE', key: 'size', align: 'right' },
						{ header: 'CREATED', key: 'created' },
					],
					rows.map((row) => ({
						channel: row.channel,
						path: row.path,
						size: row.exists ? String(row.size) : '-',
						created: row.exists ? (row.created ?? '(no banner)') : 'missing',
					})),
				);
			} catch (err) {
				output.error(`Inspect failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
