/**
 * Test harness for code that logs through chanlog.
 *
 * In-memory stand-ins for the file system, process launcher and standard
 * streams, so engines can be exercised without touching the host.
 */

import { FileFlags, type FileFlagSet, type FileHandle, type FileSystem, type OutputStream, type ProcessLauncher } from './io.js';

// ─── Memory File System ───────────────────────────────────────────────────────

class MemoryFileHandle implements FileHandle {
	private open = true;

	constructor(
		readonly path: string,
		private readonly fs: MemoryFileSystem,
	) {}

	isOpen(): boolean {
		return this.open;
	}

	write(data: Uint8Array, length = data.length): void {
		if (!this.open) {
			throw new Error(`EBADF: write to closed file ${this.path}`);
		}
		this.fs.append(this.path, data.subarray(0, length));
	}

	close(): void {
		if (this.open) this.fs.closeCount++;
		this.open = false;
	}
}

/**
 * File system backed by a Map of path to contents.
 * Records every open for assertion.
 */
export class MemoryFileSystem implements FileSystem {
	private readonly files = new Map<string, Buffer>();
	readonly opened: Array<{ path: string; flags: FileFlagSet }> = [];
	closeCount = 0;
	private readonly failPaths = new Set<string>();

	open(path: string, flags: FileFlagSet): FileHandle {
		this.opened.push({ path, flags });
		if (this.failPaths.has(path)) {
			throw new Error(`EACCES: permission denied, open '${path}'`);
		}
		if (flags & FileFlags.Write) {
			if (!(flags & FileFlags.Append) || !this.files.has(path)) {
				this.files.set(path, Buffer.alloc(0));
			}
		} else if (!this.files.has(path)) {
			throw new Error(`ENOENT: no such file or directory, open '${path}'`);
		}
		return new MemoryFileHandle(path, this);
	}

	/** Make subsequent opens of path fail */
	failOpen(path: string): void {
		this.failPaths.add(path);
	}

	append(path: string, data: Uint8Array): void {
		const current = this.files.get(path) ?? Buffer.alloc(0);
		this.files.set(path, Buffer.concat([current, data]));
	}

	exists(path: string): boolean {
		return this.files.has(path);
	}

	read(path: string): string {
		const content = this.files.get(path);
		if (content === undefined) {
			throw new Error(`ENOENT: no such file or directory, open '${path}'`);
		}
		return content.toString('utf8');
	}

	paths(): string[] {
		return [...this.files.keys()].sort();
	}
}

// ─── Mock Launcher ────────────────────────────────────────────────────────────

/**
 * Process launcher that records command lines instead of running them.
 */
export class MockLauncher implements ProcessLauncher {
	readonly commands: string[] = [];
	private shouldFail = false;

	/** Make subsequent starts throw */
	setFail(fail: boolean): void {
		this.shouldFail = fail;
	}

	start(commandLine: string): void {
		this.commands.push(commandLine);
		if (this.shouldFail) {
			throw new Error('Mock launch failure');
		}
	}
}

// ─── Memory Stream ────────────────────────────────────────────────────────────

/**
 * Output stream that keeps every chunk it receives.
 */
export class MemoryStream implements OutputStream {
	readonly chunks: Uint8Array[] = [];

	write(chunk: Uint8Array): boolean {
		this.chunks.push(chunk);
		return true;
	}

	text(): string {
		return Buffer.concat(this.chunks).toString('utf8');
	}

	clear(): void {
		this.chunks.length = 0;
	}
}
