/**
 * Channel sink set: per-channel file handle, standard stream and
 * "has content" flag.
 *
 * Owned by LogEngine. Files are opened by configure() and closed by
 * close(); content flags accumulate for the life of the set.
 */

import { parse, join } from 'node:path';
import {
	CHANNELS,
	type Channel,
	ContractViolationError,
	FileFlags,
	type FileHandle,
	type FileSystem,
	type OutputStream,
	type OutputTarget,
	channelName,
	formatAsctime,
	policyOf,
} from '@chanlog/sdk';

/** First bytes of every channel file, followed by a timestamp */
export const FILE_BANNER = 'File created ';

export interface ChannelSinkSetOptions {
	fileSystem: FileSystem;
	stdout: OutputStream;
	stderr: OutputStream;
	/** Clock used for the file banner */
	now?: () => Date;
	/** Clear content flags on every configure() */
	resetContentOnConfigure?: boolean;
}

interface ChannelState {
	file: FileHandle | null;
	stream: OutputStream | null;
	hasContent: boolean;
}

/**
 * Path of a channel file: the base path with its extension replaced.
 * `Log` → `Log.err`, `out/run.txt` → `out/run.err`.
 */
export function channelFilePath(basePath: string, extension: string): string {
	const { dir, name } = parse(basePath);
	return join(dir, `${name}.${extension}`);
}

function assertHasFileName(basePath: string): void {
	const { name } = parse(basePath);
	if (basePath.endsWith('/') || basePath.endsWith('\\') || name === '' || name === '.' || name === '..') {
		throw new ContractViolationError(`Log base path has no file name: "${basePath}"`);
	}
}

export class ChannelSinkSet {
	private readonly fileSystem: FileSystem;
	private readonly stdout: OutputStream;
	private readonly stderr: OutputStream;
	private readonly now: () => Date;
	private readonly resetContentOnConfigure: boolean;
	private readonly states: readonly ChannelState[];

	constructor(options: ChannelSinkSetOptions) {
		this.fileSystem = options.fileSystem;
		this.stdout = options.stdout;
		this.stderr = options.stderr;
		this.now = options.now ?? (() => new Date());
		this.resetContentOnConfigure = options.resetContentOnConfigure ?? false;
		this.states = CHANNELS.map(() => ({ file: null, stream: null, hasContent: false }));
	}

	/**
	 * Close any open files, then create a fresh file for every channel with
	 * an extension and bind each channel's standard stream.
	 */
	configure(basePath: string): void {
		this.close();
		assertHasFileName(basePath);

		const banner = Buffer.from(FILE_BANNER + formatAsctime(this.now()), 'utf8');
		for (const channel of CHANNELS) {
			const policy = policyOf(channel);
			const state = this.states[channel];
			if (this.resetContentOnConfigure) state.hasContent = false;

			if (policy.fileExtension !== null) {
				const file = this.fileSystem.open(
					channelFilePath(basePath, policy.fileExtension),
					FileFlags.Write | FileFlags.SequentialScan,
				);
				state.file = file;
				file.write(banner);
			}
			state.stream = this.streamFor(policy.outputTarget);
		}
	}

	/**
	 * Emit formatted bytes on a channel. The content flag is set by any
	 * accepted write, even when bytes is empty; a refused write leaves it alone.
	 */
	write(channel: Channel, bytes: Uint8Array): void {
		const policy = policyOf(channel);
		const state = this.states[channel];

		if (policy.fileExtension !== null) {
			if (state.file === null || !state.file.isOpen()) {
				throw new ContractViolationError(`The ${channelName(channel)} channel is not open`);
			}
			if (bytes.length > 0) state.file.write(bytes);
		}
		if (state.stream !== null && bytes.length > 0) {
			// Streams may hold the chunk after write() returns; Buffer.from copies it.
			state.stream.write(Buffer.from(bytes));
		}
		state.hasContent = true;
	}

	/** Close every open file. Safe to call repeatedly. */
	close(): void {
		for (const state of this.states) {
			if (state.file?.isOpen()) state.file.close();
		}
	}

	hasContent(channel: Channel): boolean {
		policyOf(channel);
		return this.states[channel].hasContent;
	}

	/** Path of the channel's most recent file, or null if it has none. */
	filePath(channel: Channel): string | null {
		policyOf(channel);
		return this.states[channel].file?.path ?? null;
	}

	private streamFor(target: OutputTarget): OutputStream | null {
		switch (target) {
			case 'stderr':
				return this.stderr;
			case 'stdout':
				return this.stdout;
			case 'none':
				return null;
		}
	}
}
