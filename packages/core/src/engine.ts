/**
 * LogEngine: the multi-channel logging facade.
 *
 * Library-first API:
 *   const engine = new LogEngine({ basePath: 'logs/build' });
 *   engine.setStatus('compile');
 *   engine.write(Channel.Warning, 'disk low: %d MB free', 120);
 *   engine.shutdown();
 *
 * The engine is synchronous and keeps no locks; callers on several
 * threads of control must serialize their calls.
 */

import { format } from 'node:util';
import {
	Channel,
	type FileSystem,
	MessageFormatter,
	type OutputStream,
	type ProcessLauncher,
	policyOf,
} from '@chanlog/sdk';
import { NodeProcessLauncher } from './launcher.js';
import { NodeFileSystem } from './node-fs.js';
import { ChannelSinkSet } from './sinks.js';

export const DEFAULT_BASE_PATH = 'Log';

/** Builds the shell command that displays a file */
export type ViewerCommand = (filePath: string) => string;

export interface LogEngineOptions {
	/** Base path of the channel files (default: "Log") */
	basePath?: string;
	/** File system the channel files are written through (default: NodeFileSystem) */
	fileSystem?: FileSystem;
	/** Launcher for the error viewer (default: NodeProcessLauncher) */
	launcher?: ProcessLauncher;
	stdout?: OutputStream;
	stderr?: OutputStream;
	/** Viewer opened on the error file at shutdown; null disables it */
	viewer?: ViewerCommand | null;
	/** Called when the viewer cannot be started */
	onViewerError?: (error: unknown) => void;
	/** Clock for file banners */
	now?: () => Date;
	/** Clear content flags whenever the engine is reconfigured (default: false) */
	resetContentOnConfigure?: boolean;
}

/** Command that opens a file in the platform's text viewer. */
export function defaultViewerCommand(
	filePath: string,
	platform: NodeJS.Platform = process.platform,
): string {
	switch (platform) {
		case 'win32':
			return `notepad.exe "${filePath}"`;
		case 'darwin':
			return `open -t "${filePath}"`;
		default:
			return `xdg-open "${filePath}"`;
	}
}

export class LogEngine {
	private readonly sinks: ChannelSinkSet;
	private readonly formatter = new MessageFormatter();
	private readonly launcher: ProcessLauncher;
	private readonly viewer: ViewerCommand | null;
	private readonly onViewerError?: (error: unknown) => void;
	private currentStatus = '';
	private shutDown = false;

	constructor(options: LogEngineOptions = {}) {
		this.onViewerError = options.onViewerError;
		this.launcher = options.launcher ?? new NodeProcessLauncher(options.onViewerError);
		this.viewer = options.viewer === undefined ? defaultViewerCommand : options.viewer;
		this.sinks = new ChannelSinkSet({
			fileSystem: options.fileSystem ?? new NodeFileSystem(),
			stdout: options.stdout ?? process.stdout,
			stderr: options.stderr ?? process.stderr,
			now: options.now,
			resetContentOnConfigure: options.resetContentOnConfigure,
		});
		this.configure(options.basePath ?? DEFAULT_BASE_PATH);
	}

	/**
	 * Point every channel at fresh files derived from basePath; its
	 * extension is replaced by each channel's own.
	 */
	configure(basePath: string): void {
		this.sinks.configure(basePath);
		this.shutDown = false;
	}

	/**
	 * Render a printf-style message (see util.format) and emit it on a
	 * channel. The rendered text must stay under LOG_BUFFER_SIZE bytes.
	 */
	write(channel: Channel, message: string, ...args: unknown[]): void {
		const policy = policyOf(channel);
		const rendered = format(message, ...args);
		const bytes = this.formatter.format(rendered, policy, this.currentStatus);
		this.sinks.write(channel, bytes);
	}

	/** Replace the status injected before messages on prefixed channels. */
	setStatus(text: string): void {
		this.currentStatus = text;
	}

	get status(): string {
		return this.currentStatus;
	}

	hasContent(channel: Channel): boolean {
		return this.sinks.hasContent(channel);
	}

	filePath(channel: Channel): string | null {
		return this.sinks.filePath(channel);
	}

	close(): void {
		this.sinks.close();
	}

	/**
	 * Close every channel, then open the viewer on the error file if the
	 * Error channel received anything. Runs once per configuration.
	 */
	shutdown(): void {
		if (this.shutDown) return;
		this.shutDown = true;
		this.close();

		if (this.viewer === null || !this.hasContent(Channel.Error)) return;
		const errorFile = this.filePath(Channel.Error);
		if (errorFile === null) return;

		try {
			this.launcher.start(this.viewer(errorFile));
		} catch (err) {
			// The process is exiting; a viewer that fails to start is not an error.
			this.onViewerError?.(err);
		}
	}
}
