/**
 * Failure handler: checked conditions that report to the Error channel.
 *
 * verify() logs and returns false; ensure() logs and throws.
 */

import { CheckFailedError, Channel } from '@chanlog/sdk';
import type { LogEngine } from './engine.js';

export interface SourceLocation {
	file: string;
	line: number;
}

const UNKNOWN_LOCATION: SourceLocation = { file: '<unknown>', line: 0 };

// "    at fn (/src/app.ts:12:5)" or "    at /src/app.ts:12:5"
const FRAME_RE = /\(?((?:file:\/\/)?[^\s()]+?):(\d+):\d+\)?$/;

/**
 * File and line of a stack frame; depth 0 is the function calling
 * callerLocation().
 */
export function callerLocation(depth = 1): SourceLocation {
	const frames = (new Error().stack ?? '').split('\n').slice(1);
	const frame = frames[depth + 1];
	if (!frame) return UNKNOWN_LOCATION;
	const match = FRAME_RE.exec(frame.trim());
	if (!match) return UNKNOWN_LOCATION;
	return { file: match[1], line: Number.parseInt(match[2], 10) };
}

export function failureMessage(expression: string, location: SourceLocation): string {
	return `Failed check '${expression}' in ${location.file} line ${location.line}\n`;
}

/**
 * Write a failed check to the Error channel. Throws CheckFailedError when
 * doThrow is set; otherwise returns false.
 */
export function reportFailure(
	engine: LogEngine,
	expression: string,
	location: SourceLocation,
	doThrow: boolean,
): false {
	const message = failureMessage(expression, location);
	engine.write(Channel.Error, '%s', message);
	if (doThrow) {
		throw new CheckFailedError(message.trimEnd());
	}
	return false;
}

/** Report a falsy condition and carry on. */
export function verify(
	engine: LogEngine,
	condition: unknown,
	expression: string,
	location?: SourceLocation,
): boolean {
	if (condition) return true;
	return reportFailure(engine, expression, location ?? callerLocation(1), false);
}

/** Report a falsy condition and throw. */
export function ensure(
	engine: LogEngine,
	condition: unknown,
	expression: string,
	location?: SourceLocation,
): asserts condition {
	if (condition) return;
	reportFailure(engine, expression, location ?? callerLocation(1), true);
}
