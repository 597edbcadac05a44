/**
 * chanlog version: versions of the chanlog workspaces and the runtime.
 *
 * Package manifests are found through module resolution, so the command
 * reports the same versions from the sources and from a dist/ build.
 */

import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import type { Command } from 'commander';
import * as output from '../output.js';

export const CHANLOG_PACKAGES = ['@chanlog/cli', '@chanlog/core', '@chanlog/sdk'] as const;

export interface VersionInfo {
	chanlog: string;
	packages: Record<string, string>;
	node: string;
	platform: string;
}

function isModuleNotFound(err: unknown): boolean {
	const code = (err as NodeJS.ErrnoException).code;
	return code === 'MODULE_NOT_FOUND' || code === 'ERR_PACKAGE_PATH_NOT_EXPORTED' || code === 'ENOENT';
}

/**
 * Version field of an installed package's manifest, or 'unknown' when the
 * package cannot be resolved.
 */
export async function readPackageVersion(name: string, from: string | URL = import.meta.url): Promise<string> {
	let manifestPath: string;
	try {
		manifestPath = createRequire(from).resolve(`${name}/package.json`);
	} catch (err) {
		if (isModuleNotFound(err)) return 'unknown';
		throw err;
	}

	const manifest: unknown = JSON.parse(await readFile(manifestPath, 'utf-8'));
	if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
		return typeof manifest.version === 'string' ? manifest.version : 'unknown';
	}
	return 'unknown';
}

export async function getVersionInfo(): Promise<VersionInfo> {
	const versions = await Promise.all(CHANLOG_PACKAGES.map((name) => readPackageVersion(name)));
	const packages: Record<string, string> = {};
	CHANLOG_PACKAGES.forEach((name, i) => {
		packages[name] = versions[i];
	});
	return {
		chanlog: packages['@chanlog/cli'],
		packages,
		node: process.version,
		platform: `${process.platform} ${process.arch}`,
	};
}

export function registerVersionCommand(program: Command): void {
	program
		.command('version')
		.description('Print the chanlog package versions and the runtime')
		.action(async () => {
			const info = await getVersionInfo();

			if (output.isJsonMode()) {
				output.json(info);
				return;
			}

			output.info(`chanlog  ${info.chanlog}`);
			output.table(
				[
					{ header: 'PACKAGE', key: 'name' },
					{ header: 'VERSION', key: 'version' },
				],
				Object.entries(info.packages).map(([name, version]) => ({ name, version })),
			);
			output.info(`node     ${info.node}`);
			output.info(`platform ${info.platform}`);
		});
}
