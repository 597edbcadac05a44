/**
 * Process launcher: starts a detached shell command and forgets it.
 */

import { spawn } from 'node:child_process';
import type { ProcessLauncher } from '@chanlog/sdk';

export class NodeProcessLauncher implements ProcessLauncher {
	constructor(private readonly onError?: (error: unknown) => void) {}

	start(commandLine: string): void {
		const child = spawn(commandLine, {
			shell: true,
			detached: true,
			stdio: 'ignore',
		});
		// Spawn failures are emitted asynchronously, after start() has returned.
		child.on('error', (err) => {
			this.onError?.(err);
		});
		child.unref();
	}
}
