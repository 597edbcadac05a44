/**
 * Channels and their routing policies.
 *
 * The policy table is fixed at load time. Every write looks its channel up
 * here, so lookups are plain property reads with no allocation.
 */

import { ContractViolationError } from './errors.js';

// ─── Channel ──────────────────────────────────────────────────────────────────

export const Channel = {
	Error: 0,
	Warning: 1,
	Screen: 2,
	Note: 3,
	FileOnly: 4,
} as const;

export type Channel = (typeof Channel)[keyof typeof Channel];

/** Every channel, first to last */
export const CHANNELS: readonly Channel[] = Object.freeze([
	Channel.Error,
	Channel.Warning,
	Channel.Screen,
	Channel.Note,
	Channel.FileOnly,
]);

// ─── Policy ───────────────────────────────────────────────────────────────────

export type OutputTarget = 'stderr' | 'stdout' | 'none';

export interface ChannelPolicy {
	/** Extension of the channel's file, or null if the channel never persists */
	readonly fileExtension: string | null;
	/** Label written before each message */
	readonly header: string;
	/** Standard stream that also receives each message */
	readonly outputTarget: OutputTarget;
	/** Whether the engine status is injected before the message */
	readonly addStatusPrefix: boolean;
}

export const CHANNEL_POLICIES: Readonly<Record<Channel, ChannelPolicy>> = Object.freeze({
	[Channel.Error]: { fileExtension: 'err', header: 'Error: ', outputTarget: 'stderr', addStatusPrefix: true },
	[Channel.Warning]: { fileExtension: 'warn', header: 'Warning: ', outputTarget: 'stderr', addStatusPrefix: true },
	[Channel.Screen]: { fileExtension: null, header: '', outputTarget: 'stdout', addStatusPrefix: false },
	[Channel.Note]: { fileExtension: 'log', header: '', outputTarget: 'stdout', addStatusPrefix: false },
	[Channel.FileOnly]: { fileExtension: 'file', header: '', outputTarget: 'none', addStatusPrefix: true },
} satisfies Record<Channel, ChannelPolicy>);

export function isChannel(value: unknown): value is Channel {
	return (
		typeof value === 'number' &&
		Number.isInteger(value) &&
		value >= Channel.Error &&
		value <= Channel.FileOnly
	);
}

/**
 * Look up the routing policy of a channel.
 * Throws ContractViolationError for a value outside the channel set.
 */
export function policyOf(channel: Channel): ChannelPolicy {
	if (!isChannel(channel)) {
		throw new ContractViolationError(`Undefined channel: ${String(channel)}`);
	}
	return CHANNEL_POLICIES[channel];
}

// ─── Names ────────────────────────────────────────────────────────────────────

const CHANNEL_NAMES: Readonly<Record<Channel, string>> = Object.freeze({
	[Channel.Error]: 'error',
	[Channel.Warning]: 'warning',
	[Channel.Screen]: 'screen',
	[Channel.Note]: 'note',
	[Channel.FileOnly]: 'file',
});

const NAME_ALIASES: ReadonlyMap<string, Channel> = new Map<string, Channel>([
	['error', Channel.Error],
	['err', Channel.Error],
	['warning', Channel.Warning],
	['warn', Channel.Warning],
	['screen', Channel.Screen],
	['note', Channel.Note],
	['log', Channel.Note],
	['file', Channel.FileOnly],
	['fileonly', Channel.FileOnly],
]);

export function channelName(channel: Channel): string {
	policyOf(channel);
	return CHANNEL_NAMES[channel];
}

/** Parse a channel name (case-insensitive). Returns null for unknown names. */
export function parseChannel(name: string): Channel | null {
	return NAME_ALIASES.get(name.trim().toLowerCase()) ?? null;
}
