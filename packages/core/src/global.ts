/**
 * Process-wide engine.
 *
 * Usage:
 *
 * ```typescript
 * import { initLogEngine, logWarning, shutdownOnExit } from "@chanlog/core";
 *
 * // Once, in the composition root
 * shutdownOnExit(initLogEngine({ basePath: "logs/build" }));
 *
 * // Anywhere
 * logWarning("disk low: %d MB free\n", 120);
 * ```
 */

import { Channel } from '@chanlog/sdk';
import { LogEngine, type LogEngineOptions } from './engine.js';

let globalEngine: LogEngine | null = null;

/**
 * Replace the process-wide engine. A previous engine is shut down first.
 */
export function initLogEngine(options?: LogEngineOptions): LogEngine {
	globalEngine?.shutdown();
	globalEngine = new LogEngine(options);
	return globalEngine;
}

/** The process-wide engine, created with defaults on first use. */
export function getLogEngine(): LogEngine {
	if (!globalEngine) {
		globalEngine = new LogEngine();
	}
	return globalEngine;
}

export function logError(message: string, ...args: unknown[]): void {
	getLogEngine().write(Channel.Error, message, ...args);
}

export function logWarning(message: string, ...args: unknown[]): void {
	getLogEngine().write(Channel.Warning, message, ...args);
}

export function logScreen(message: string, ...args: unknown[]): void {
	getLogEngine().write(Channel.Screen, message, ...args);
}

export function logNote(message: string, ...args: unknown[]): void {
	getLogEngine().write(Channel.Note, message, ...args);
}

export function logFile(message: string, ...args: unknown[]): void {
	getLogEngine().write(Channel.FileOnly, message, ...args);
}

/**
 * Shut the engine down when the process exits.
 * Returns a function that removes the hook.
 */
export function shutdownOnExit(engine: LogEngine): () => void {
	const handler = (): void => {
		engine.shutdown();
	};
	process.once('exit', handler);
	return () => {
		process.removeListener('exit', handler);
	};
}
