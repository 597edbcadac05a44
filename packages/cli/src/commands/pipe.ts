/**
 * chanlog pipe: route lines from stdin, or from a command's output, into
 * the log channels.
 *
 * Lines matching the error pattern go to the Error channel, lines matching
 * the warning pattern to Warning, everything else to the default channel.
 * The engine is shut down at the end, which opens the viewer if anything
 * reached the Error channel.
 */

import { type ChildProcess, spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import { PassThrough, type Readable } from 'node:stream';
import { LogEngine, type LogEngineOptions } from '@chanlog/core';
import { Channel, channelName, parseChannel } from '@chanlog/sdk';
import type { Command } from 'commander';
import { type ChanlogConfig, loadCliConfig, viewerCommand } from '../config.js';
import { routeLine, splitLine } from '../line-router.js';
import * as output from '../output.js';

export interface PipeOptions {
	/** Command to run; its stdout and stderr are routed. Empty reads stdin. */
	command?: string[];
	/** Exit 1 when the Error channel received anything */
	failOnError?: boolean;
	/** Input read when no command is given (default: process.stdin) */
	input?: Readable;
	/** Engine overrides, e.g. a file system or streams for tests */
	engine?: Partial<LogEngineOptions>;
}

export interface PipeResult {
	exitCode: number;
	lines: number;
	errors: number;
	warnings: number;
	files: Record<string, string | null>;
}

interface ChildExit {
	code: number;
	error?: Error;
}

function mergeOutput(child: ChildProcess): Readable {
	const merged = new PassThrough();
	const sources = [child.stdout, child.stderr].filter((s): s is Readable => s !== null);
	let open = sources.length;
	if (open === 0) merged.end();
	for (const source of sources) {
		source.pipe(merged, { end: false });
		source.once('end', () => {
			open--;
			if (open === 0) merged.end();
		});
	}
	return merged;
}

function waitForExit(child: ChildProcess): Promise<ChildExit> {
	return new Promise((resolve) => {
		child.once('error', (error) => resolve({ code: 127, error }));
		child.once('close', (code) => resolve({ code: code ?? 1 }));
	});
}

export async function runPipe(config: ChanlogConfig, options: PipeOptions = {}): Promise<PipeResult> {
	const engine = new LogEngine({
		basePath: config.base,
		viewer: viewerCommand(config.viewer),
		resetContentOnConfigure: config.resetContentOnConfigure,
		onViewerError: (err) => output.warn(`Could not open the error log: ${String(err)}`),
		...options.engine,
	});
	engine.setStatus(config.status);

	const command = options.command ?? [];
	let child: ChildProcess | null = null;
	let exited: Promise<ChildExit> = Promise.resolve({ code: 0 });
	let input: Readable;
	if (command.length > 0) {
		child = spawn(command[0], command.slice(1), { stdio: ['inherit', 'pipe', 'pipe'] });
		exited = waitForExit(child);
		input = mergeOutput(child);
	} else {
		input = options.input ?? process.stdin;
	}

	const result: PipeResult = { exitCode: 0, lines: 0, errors: 0, warnings: 0, files: {} };
	try {
		const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
		for await (const line of lines) {
			const channel = routeLine(line, config.patterns, config.channel);
			for (const piece of splitLine(line)) {
				engine.write(channel, '%s\n', piece);
			}
			result.lines++;
			if (channel === Channel.Error) result.errors++;
			if (channel === Channel.Warning) result.warnings++;
		}

		const exit = await exited;
		if (exit.error) {
			engine.write(Channel.Error, 'Failed to start %s: %s\n', command[0], exit.error.message);
		}
		result.exitCode = exit.code;
	} finally {
		engine.shutdown();
	}

	for (const channel of [Channel.Error, Channel.Warning, Channel.Note, Channel.FileOnly]) {
		result.files[channelName(channel)] = engine.filePath(channel);
	}
	if (options.failOnError && engine.hasContent(Channel.Error) && result.exitCode === 0) {
		result.exitCode = 1;
	}
	return result;
}

interface PipeCommandOptions {
	base?: string;
	status?: string;
	channel?: string;
	viewer: boolean;
	failOnError?: boolean;
}

export function registerPipeCommand(program: Command): void {
	program
		.command('pipe')
		.description('Route lines from stdin or a command into the log channels')
		.argument('[command...]', 'Command to run; its stdout and stderr are routed')
		.option('-b, --base <path>', 'Base path of the channel files')
		.option('-s, --status <text>', 'Status prefix for error, warning and file-only lines')
		.option('-c, --channel <name>', 'Channel for lines matching no pattern')
		.option('--no-viewer', 'Do not open the error log at the end')
		.option('--fail-on-error', 'Exit 1 when any line went to the error channel')
		.action(async (command: string[], opts: PipeCommandOptions, cmd: Command) => {
			try {
				const globalOpts = cmd.parent?.opts() ?? {};
				const config = await loadCliConfig({ configPath: globalOpts.config as string | undefined });
				if (opts.base) config.base = opts.base;
				if (opts.status !== undefined) config.status = opts.status;
				if (!opts.viewer) config.viewer = false;
				if (opts.channel) {
					const channel = parseChannel(opts.channel);
					if (channel === null) {
						output.error(`Unknown channel "${opts.channel}"`);
						process.exitCode = 2;
						return;
					}
					config.channel = channel;
				}

				const result = await runPipe(config, { command, failOnError: opts.failOnError });

				if (output.isJsonMode()) {
					output.json(result);
				} else if (result.errors > 0) {
					output.warn(`${result.lines} lines, ${result.errors} errors, ${result.warnings} warnings`);
				} else {
					output.success(`${result.lines} lines, ${result.warnings} warnings`);
				}
				process.exitCode = result.exitCode;
			} catch (err) {
				output.error(`Pipe failed: ${err instanceof Error ? err.message : String(err)}`);
				process.exitCode = 1;
			}
		});
}
