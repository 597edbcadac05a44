/**
 * Collaborator interfaces: the file, process and stream seams the engine
 * writes through. Node adapters live in @chanlog/core; in-memory doubles
 * live in ./testing.ts.
 */

// ─── Files ────────────────────────────────────────────────────────────────────

/** Bit flags for FileSystem.open */
export const FileFlags = {
	Read: 1 << 0,
	/** Create, truncating any existing file */
	Write: 1 << 1,
	/** With Write: keep existing content and append */
	Append: 1 << 2,
	/** Access-pattern hint; adapters may ignore it */
	SequentialScan: 1 << 3,
} as const;

export type FileFlagSet = number;

export interface FileHandle {
	readonly path: string;
	isOpen(): boolean;
	/** Write the first `length` bytes of data (default: all of it). */
	write(data: Uint8Array, length?: number): void;
	/** Flush and close. Closing a closed handle does nothing. */
	close(): void;
}

export interface FileSystem {
	open(path: string, flags: FileFlagSet): FileHandle;
}

// ─── Processes ────────────────────────────────────────────────────────────────

export interface ProcessLauncher {
	/** Start a process from a shell command line; fire and forget. */
	start(commandLine: string): void;
}

// ─── Streams ──────────────────────────────────────────────────────────────────

/** Anything shaped like process.stdout */
export interface OutputStream {
	write(chunk: Uint8Array): unknown;
}
