/**
 * CLI configuration: chanlog.yaml, environment and defaults.
 *
 * Precedence, lowest first: defaults, YAML file, environment
 * (CHANLOG_BASE, CHANLOG_VIEWER), command-line flags (applied by commands).
 */

import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { DEFAULT_BASE_PATH, type ViewerCommand } from '@chanlog/core';
import { Channel, ConfigError, parseChannel } from '@chanlog/sdk';
import yaml from 'js-yaml';

export const DEFAULT_CONFIG_FILE = 'chanlog.yaml';

export interface LinePatterns {
	error: RegExp | null;
	warning: RegExp | null;
}

export interface ChanlogConfig {
	/** Base path of the channel files */
	base: string;
	/** Status prefix for prefixed channels */
	status: string;
	/** Channel for lines matching no pattern */
	channel: Channel;
	/** Viewer command ("{path}" is substituted), false to disable, null for the platform default */
	viewer: string | false | null;
	resetContentOnConfigure: boolean;
	patterns: LinePatterns;
}

export const DEFAULT_PATTERNS: Readonly<LinePatterns> = Object.freeze({
	error: /\b(error|fatal)\b/i,
	warning: /\bwarn(ing)?\b/i,
});

export function defaultConfig(): ChanlogConfig {
	return {
		base: DEFAULT_BASE_PATH,
		status: '',
		channel: Channel.Note,
		viewer: null,
		resetContentOnConfigure: false,
		patterns: { ...DEFAULT_PATTERNS },
	};
}

export interface LoadConfigOptions {
	/** Explicit config file; missing explicit files are an error */
	configPath?: string;
	env?: NodeJS.ProcessEnv;
	cwd?: string;
}

const KNOWN_KEYS = new Set(['base', 'status', 'channel', 'viewer', 'reset_content_on_configure', 'patterns']);
const DISABLED_VIEWER = new Set(['false', 'off', 'none', '0']);

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compilePattern(field: string, value: unknown): RegExp | null {
	if (value === null) return null;
	if (typeof value !== 'string') {
		throw new ConfigError(field, 'must be a string or null');
	}
	try {
		return new RegExp(value, 'i');
	} catch (err) {
		throw new ConfigError(field, `invalid regular expression "${value}"`, { cause: err });
	}
}

/**
 * Validate parsed YAML and merge it over the defaults. Relative base paths
 * are resolved against the config file's directory.
 */
export function parseConfig(raw: unknown, configDir: string): ChanlogConfig {
	const config = defaultConfig();
	if (raw === null || raw === undefined) return config;
	if (!isRecord(raw)) {
		throw new ConfigError('config', 'must be a mapping');
	}

	for (const key of Object.keys(raw)) {
		if (!KNOWN_KEYS.has(key)) throw new ConfigError(key, 'unknown key');
	}

	if (raw.base !== undefined) {
		if (typeof raw.base !== 'string' || raw.base.trim() === '') {
			throw new ConfigError('base', 'must be a non-empty string');
		}
		config.base = isAbsolute(raw.base) ? raw.base : join(configDir, raw.base);
	}

	if (raw.status !== undefined) {
		if (typeof raw.status !== 'string') throw new ConfigError('status', 'must be a string');
		config.status = raw.status;
	}

	if (raw.channel !== undefined) {
		const channel = typeof raw.channel === 'string' ? parseChannel(raw.channel) : null;
		if (channel === null) throw new ConfigError('channel', `unknown channel "${String(raw.channel)}"`);
		config.channel = channel;
	}

	if (raw.viewer !== undefined) {
		if (raw.viewer !== false && typeof raw.viewer !== 'string') {
			throw new ConfigError('viewer', 'must be a command string or false');
		}
		config.viewer = raw.viewer;
	}

	if (raw.reset_content_on_configure !== undefined) {
		if (typeof raw.reset_content_on_configure !== 'boolean') {
			throw new ConfigError('reset_content_on_configure', 'must be a boolean');
		}
		config.resetContentOnConfigure = raw.reset_content_on_configure;
	}

	if (raw.patterns !== undefined) {
		if (!isRecord(raw.patterns)) throw new ConfigError('patterns', 'must be a mapping');
		for (const key of Object.keys(raw.patterns)) {
			if (key !== 'error' && key !== 'warning') throw new ConfigError(`patterns.${key}`, 'unknown key');
		}
		if (raw.patterns.error !== undefined) {
			config.patterns.error = compilePattern('patterns.error', raw.patterns.error);
		}
		if (raw.patterns.warning !== undefined) {
			config.patterns.warning = compilePattern('patterns.warning', raw.patterns.warning);
		}
	}

	return config;
}

export function resolveConfigPath(
	configPath: string | undefined,
	env: NodeJS.ProcessEnv = process.env,
	cwd: string = process.cwd(),
): { path: string; explicit: boolean } {
	const explicit = configPath ?? env.CHANLOG_CONFIG;
	if (explicit) return { path: resolve(cwd, explicit), explicit: true };
	return { path: join(cwd, DEFAULT_CONFIG_FILE), explicit: false };
}

/**
 * Load the CLI configuration. A missing default chanlog.yaml yields the
 * defaults; a missing explicit file is a ConfigError.
 */
export async function loadCliConfig(options: LoadConfigOptions = {}): Promise<ChanlogConfig> {
	const env = options.env ?? process.env;
	const cwd = options.cwd ?? process.cwd();
	const { path, explicit } = resolveConfigPath(options.configPath, env, cwd);

	let raw: unknown = null;
	try {
		raw = yaml.load(await readFile(path, 'utf-8'));
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === 'ENOENT' && !explicit) {
			raw = null;
		} else if (err instanceof yaml.YAMLException) {
			throw new ConfigError('config', `invalid YAML in ${path}: ${err.reason}`, { cause: err });
		} else {
			throw new ConfigError('config', `cannot read ${path}`, { cause: err });
		}
	}

	const config = parseConfig(raw, dirname(path));

	if (env.CHANLOG_BASE) config.base = env.CHANLOG_BASE;
	if (env.CHANLOG_VIEWER !== undefined && env.CHANLOG_VIEWER !== '') {
		config.viewer = DISABLED_VIEWER.has(env.CHANLOG_VIEWER.toLowerCase()) ? false : env.CHANLOG_VIEWER;
	}

	return config;
}

/**
 * Engine viewer option for a configured viewer: a command builder, null
 * when disabled, undefined for the platform default.
 */
export function viewerCommand(viewer: string | false | null): ViewerCommand | null | undefined {
	if (viewer === false) return null;
	if (viewer === null) return undefined;
	return (path) => (viewer.includes('{path}') ? viewer.replaceAll('{path}', path) : `${viewer} "${path}"`);
}
