import {
	Channel,
	ContractViolationError,
	LOG_BUFFER_SIZE,
	MAX_STATUS_SIZE,
	MemoryFileSystem,
	MemoryStream,
	MockLauncher,
} from '@chanlog/sdk';
import { describe, expect, it, vi } from 'vitest';
import { LogEngine, type LogEngineOptions, defaultViewerCommand } from '../engine.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const NOW = new Date(2026, 0, 5, 9, 3, 7);
const BANNER = 'File created Mon Jan  5 09:03:07 2026\n';

function makeEngine(overrides: Partial<LogEngineOptions> = {}) {
	const fileSystem = new MemoryFileSystem();
	const launcher = new MockLauncher();
	const stdout = new MemoryStream();
	const stderr = new MemoryStream();
	const engine = new LogEngine({
		basePath: 'Log',
		fileSystem,
		launcher,
		stdout,
		stderr,
		now: () => NOW,
		viewer: (path) => `view "${path}"`,
		...overrides,
	});
	return { engine, fileSystem, launcher, stdout, stderr };
}

// ─── Construction ────────────────────────────────────────────────────────────

describe('LogEngine construction', () => {
	it('configures itself from the base path', () => {
		const { engine, fileSystem } = makeEngine();
		expect(fileSystem.paths()).toEqual(['Log.err', 'Log.file', 'Log.log', 'Log.warn']);
		expect(fileSystem.read('Log.err')).toBe(BANNER);
		expect(engine.filePath(Channel.Error)).toBe('Log.err');
	});

	it('uses "Log" when no base path is given', () => {
		const { fileSystem } = makeEngine({ basePath: undefined });
		expect(fileSystem.exists('Log.warn')).toBe(true);
	});

	it('starts with no content and an empty status', () => {
		const { engine } = makeEngine();
		expect(engine.status).toBe('');
		expect(engine.hasContent(Channel.Error)).toBe(false);
		expect(engine.hasContent(Channel.Screen)).toBe(false);
	});
});

// ─── Writing ─────────────────────────────────────────────────────────────────

describe('LogEngine.write', () => {
	it('writes a warning to its file and stderr', () => {
		const { engine, fileSystem, stderr, stdout } = makeEngine();
		engine.write(Channel.Warning, 'disk low');

		expect(fileSystem.read('Log.warn')).toBe(`${BANNER}Warning: disk low`);
		expect(stderr.text()).toBe('Warning: disk low');
		expect(stdout.text()).toBe('');
		expect(engine.hasContent(Channel.Warning)).toBe(true);
		expect(engine.hasContent(Channel.Error)).toBe(false);
	});

	it('sends screen output to stdout only, without status or file', () => {
		const { engine, fileSystem, stdout } = makeEngine();
		engine.setStatus('build');
		engine.write(Channel.Screen, 'progress: 50%\n');

		expect(stdout.text()).toBe('progress: 50%\r\n');
		expect(fileSystem.paths()).toEqual(['Log.err', 'Log.file', 'Log.log', 'Log.warn']);
	});

	it('renders printf-style arguments', () => {
		const { engine, fileSystem, stdout } = makeEngine();
		engine.write(Channel.Note, 'built %d of %s (%d%%)\n', 3, 'targets', 75);

		expect(fileSystem.read('Log.log')).toBe(`${BANNER}built 3 of targets (75%)\r\n`);
		expect(stdout.text()).toBe('built 3 of targets (75%)\r\n');
	});

	it('prefixes the status on file-only output and keeps it off the streams', () => {
		const { engine, fileSystem, stdout, stderr } = makeEngine();
		engine.setStatus('compile');
		engine.write(Channel.FileOnly, 'step done\n');

		expect(fileSystem.read('Log.file')).toBe(`${BANNER}compile: step done\r\n`);
		expect(stdout.text()).toBe('');
		expect(stderr.text()).toBe('');
	});

	it('puts the status before the error header', () => {
		const { engine, fileSystem } = makeEngine();
		engine.setStatus('link');
		engine.write(Channel.Error, 'missing symbol %s\n', 'main');
		expect(fileSystem.read('Log.err')).toBe(`${BANNER}link: Error: missing symbol main\r\n`);
	});

	it('truncates long statuses to the maximum', () => {
		const { engine, fileSystem } = makeEngine();
		engine.setStatus('s'.repeat(MAX_STATUS_SIZE + 10));
		engine.write(Channel.FileOnly, 'x');
		expect(fileSystem.read('Log.file')).toBe(`${BANNER}${'s'.repeat(MAX_STATUS_SIZE)}: x`);
	});

	it('leaves the message as a suffix of the channel file', () => {
		const { engine, fileSystem } = makeEngine();
		engine.write(Channel.Note, 'first\n');
		engine.write(Channel.Note, 'line one\nline two\r\n');
		expect(fileSystem.read('Log.log').endsWith('line one\r\nline two\r\n')).toBe(true);
	});

	it('marks content on an empty message', () => {
		const { engine, fileSystem } = makeEngine();
		engine.write(Channel.Note, '');
		expect(engine.hasContent(Channel.Note)).toBe(true);
		expect(fileSystem.read('Log.log')).toBe(BANNER);
	});

	it('rejects oversized messages before touching any channel', () => {
		const { engine, fileSystem } = makeEngine();
		expect(() => engine.write(Channel.Note, 'x'.repeat(LOG_BUFFER_SIZE))).toThrow(
			ContractViolationError,
		);
		expect(engine.hasContent(Channel.Note)).toBe(false);
		expect(fileSystem.read('Log.log')).toBe(BANNER);
	});

	it('rejects undefined channels', () => {
		const { engine } = makeEngine();
		expect(() => engine.write(7 as Channel, 'x')).toThrow('Undefined channel: 7');
	});

	it('keeps every message on the streams across writes', () => {
		const { engine, stdout, stderr } = makeEngine();
		engine.write(Channel.Screen, 'first\n');
		engine.write(Channel.Screen, 'xy\n');
		engine.write(Channel.Warning, 'disk low\n');
		engine.write(Channel.Warning, 'w2\n');

		expect(stdout.text()).toBe('first\r\nxy\r\n');
		expect(stderr.text()).toBe('Warning: disk low\r\nWarning: w2\r\n');
	});

	it('rejects file channel writes after close', () => {
		const { engine } = makeEngine();
		engine.close();
		expect(() => engine.write(Channel.Error, 'late')).toThrow('The error channel is not open');
	});

	it('does not count a rejected error write toward escalation', () => {
		const { engine, launcher } = makeEngine();
		engine.close();
		expect(() => engine.write(Channel.Error, 'late')).toThrow(ContractViolationError);
		expect(engine.hasContent(Channel.Error)).toBe(false);

		engine.shutdown();
		expect(launcher.commands).toEqual([]);
	});

	it('still writes screen output after close', () => {
		const { engine, stdout } = makeEngine();
		engine.close();
		engine.write(Channel.Screen, 'bye');
		expect(stdout.text()).toBe('bye');
	});
});

// ─── Configuration ───────────────────────────────────────────────────────────

describe('LogEngine.configure', () => {
	it('retargets every channel', () => {
		const { engine, fileSystem } = makeEngine();
		engine.configure('out/run.txt');
		engine.write(Channel.Warning, 'moved');

		expect(fileSystem.read('out/run.warn')).toBe(`${BANNER}Warning: moved`);
		expect(fileSystem.read('Log.warn')).toBe(BANNER);
		expect(fileSystem.closeCount).toBe(4);
	});

	it('keeps content flags for the session', () => {
		const { engine } = makeEngine();
		engine.write(Channel.Error, 'x');
		engine.configure('Next');
		expect(engine.hasContent(Channel.Error)).toBe(true);
		expect(engine.hasContent(Channel.Warning)).toBe(false);
	});

	it('clears content flags when resetContentOnConfigure is set', () => {
		const { engine } = makeEngine({ resetContentOnConfigure: true });
		engine.write(Channel.Error, 'x');
		engine.configure('Next');
		expect(engine.hasContent(Channel.Error)).toBe(false);
	});

	it('reopens channels after close', () => {
		const { engine, fileSystem } = makeEngine();
		engine.close();
		engine.configure('Log');
		engine.write(Channel.Note, 'again');
		expect(fileSystem.read('Log.log')).toBe(`${BANNER}again`);
	});
});

// ─── Shutdown ────────────────────────────────────────────────────────────────

describe('LogEngine.shutdown', () => {
	it('launches no viewer when the error channel is empty', () => {
		const { engine, launcher } = makeEngine();
		engine.write(Channel.Warning, 'only a warning');
		engine.shutdown();
		expect(launcher.commands).toEqual([]);
	});

	it('launches the viewer once on the error file after an error', () => {
		const { engine, launcher } = makeEngine();
		engine.shutdown();
		expect(launcher.commands).toEqual([]);

		engine.configure('Log');
		engine.write(Channel.Error, 'failed');
		engine.shutdown();
		expect(launcher.commands).toEqual(['view "Log.err"']);
	});

	it('closes the channel files', () => {
		const { engine, fileSystem } = makeEngine();
		engine.shutdown();
		expect(fileSystem.closeCount).toBe(4);
		expect(() => engine.write(Channel.Note, 'x')).toThrow(ContractViolationError);
	});

	it('runs once until reconfigured', () => {
		const { engine, launcher } = makeEngine();
		engine.write(Channel.Error, 'failed');
		engine.shutdown();
		engine.shutdown();
		expect(launcher.commands).toHaveLength(1);
	});

	it('skips the viewer when it is disabled', () => {
		const { engine, launcher } = makeEngine({ viewer: null });
		engine.write(Channel.Error, 'failed');
		engine.shutdown();
		expect(launcher.commands).toEqual([]);
	});

	it('uses the platform viewer by default', () => {
		const { engine, launcher } = makeEngine({ viewer: undefined });
		engine.write(Channel.Error, 'failed');
		engine.shutdown();
		expect(launcher.commands).toEqual([defaultViewerCommand('Log.err')]);
	});

	it('does not throw when the viewer fails to start', () => {
		const onViewerError = vi.fn();
		const { engine, launcher } = makeEngine({ onViewerError });
		launcher.setFail(true);
		engine.write(Channel.Error, 'failed');

		expect(() => engine.shutdown()).not.toThrow();
		expect(onViewerError).toHaveBeenCalledTimes(1);
		expect(onViewerError.mock.calls[0][0]).toBeInstanceOf(Error);
	});
});

describe('defaultViewerCommand', () => {
	it('picks a viewer per platform', () => {
		expect(defaultViewerCommand('C:\\logs\\Log.err', 'win32')).toBe('notepad.exe "C:\\logs\\Log.err"');
		expect(defaultViewerCommand('/tmp/Log.err', 'darwin')).toBe('open -t "/tmp/Log.err"');
		expect(defaultViewerCommand('/tmp/Log.err', 'linux')).toBe('xdg-open "/tmp/Log.err"');
	});
});
