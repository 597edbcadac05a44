/**
 * Synchronous Node.js file system adapter.
 */

import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import { ContractViolationError, FileFlags, type FileFlagSet, type FileHandle, type FileSystem } from '@chanlog/sdk';

function openMode(flags: FileFlagSet): 'r' | 'w' | 'a' {
	if (flags & FileFlags.Write) {
		return flags & FileFlags.Append ? 'a' : 'w';
	}
	return 'r';
}

class NodeFileHandle implements FileHandle {
	private fd: number | null;

	constructor(
		readonly path: string,
		fd: number,
	) {
		this.fd = fd;
	}

	isOpen(): boolean {
		return this.fd !== null;
	}

	write(data: Uint8Array, length = data.length): void {
		if (this.fd === null) {
			throw new ContractViolationError(`File is not open: ${this.path}`);
		}
		let offset = 0;
		while (offset < length) {
			offset += writeSync(this.fd, data, offset, length - offset);
		}
	}

	close(): void {
		if (this.fd === null) return;
		const fd = this.fd;
		this.fd = null;
		closeSync(fd);
	}
}

export class NodeFileSystem implements FileSystem {
	/**
	 * Open a file. Write creates or truncates (or appends, with Append);
	 * missing parent directories are created. SequentialScan is a hint with
	 * no effect here.
	 */
	open(path: string, flags: FileFlagSet): FileHandle {
		const mode = openMode(flags);
		if (mode !== 'r') {
			mkdirSync(dirname(path), { recursive: true });
		}
		return new NodeFileHandle(path, openSync(path, mode));
	}
}
