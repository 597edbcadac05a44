import type { ChildProcess } from 'node:child_process';
import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NodeProcessLauncher } from '../launcher.js';

vi.mock('node:child_process', () => ({ spawn: vi.fn() }));

class FakeChild extends EventEmitter {
	unref = vi.fn();
}

describe('NodeProcessLauncher', () => {
	let child: FakeChild;

	beforeEach(() => {
		vi.mocked(spawn).mockReset();
		child = new FakeChild();
		vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess);
	});

	it('starts a detached shell command and lets it go', () => {
		new NodeProcessLauncher().start('xdg-open "Log.err"');

		expect(spawn).toHaveBeenCalledWith('xdg-open "Log.err"', {
			shell: true,
			detached: true,
			stdio: 'ignore',
		});
		expect(child.unref).toHaveBeenCalledTimes(1);
	});

	it('forwards spawn errors to onError', () => {
		const onError = vi.fn();
		new NodeProcessLauncher(onError).start('missing-viewer');
		const failure = new Error('spawn missing-viewer ENOENT');
		child.emit('error', failure);
		expect(onError).toHaveBeenCalledWith(failure);
	});

	it('absorbs spawn errors without a handler', () => {
		new NodeProcessLauncher().start('missing-viewer');
		expect(() => child.emit('error', new Error('ENOENT'))).not.toThrow();
	});
});
