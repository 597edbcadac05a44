/**
 * Line routing: picks the channel for each line read by `chanlog pipe`.
 */

import { Channel, LOG_BUFFER_SIZE, utf8Boundary } from '@chanlog/sdk';
import type { LinePatterns } from './config.js';

/** Longest line piece written in one message, leaving room for its newline */
export const MAX_LINE_BYTES = LOG_BUFFER_SIZE - 2;

/**
 * Error pattern first, then warning; anything else goes to the fallback.
 */
export function routeLine(line: string, patterns: LinePatterns, fallback: Channel): Channel {
	if (patterns.error?.test(line)) return Channel.Error;
	if (patterns.warning?.test(line)) return Channel.Warning;
	return fallback;
}

/**
 * Split a line into pieces of at most maxBytes UTF-8 bytes, cutting only
 * between characters.
 */
export function splitLine(line: string, maxBytes = MAX_LINE_BYTES): string[] {
	const bytes = Buffer.from(line, 'utf8');
	if (bytes.length <= maxBytes) return [line];

	const pieces: string[] = [];
	let start = 0;
	while (start < bytes.length) {
		const end = utf8Boundary(bytes, start + maxBytes);
		pieces.push(bytes.toString('utf8', start, end));
		start = end;
	}
	return pieces;
}
