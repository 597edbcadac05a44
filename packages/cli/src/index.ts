/**
 * @chanlog/cli: programmatic entry points of the chanlog command line.
 */

export { createProgram } from './program.js';
export {
	DEFAULT_CONFIG_FILE,
	DEFAULT_PATTERNS,
	defaultConfig,
	loadCliConfig,
	parseConfig,
	resolveConfigPath,
	viewerCommand,
	type ChanlogConfig,
	type LinePatterns,
	type LoadConfigOptions,
} from './config.js';
export { MAX_LINE_BYTES, routeLine, splitLine } from './line-router.js';
export { inspectChannels, type ChannelFileInfo } from './commands/inspect.js';
export { runPipe, type PipeOptions, type PipeResult } from './commands/pipe.js';
export { CHANLOG_PACKAGES, getVersionInfo, readPackageVersion, type VersionInfo } from './commands/version.js';
