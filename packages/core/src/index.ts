/**
 * @chanlog/core: the logging engine and its Node.js adapters.
 */

export {
	DEFAULT_BASE_PATH,
	LogEngine,
	defaultViewerCommand,
	type LogEngineOptions,
	type ViewerCommand,
} from './engine.js';
export { ChannelSinkSet, FILE_BANNER, channelFilePath, type ChannelSinkSetOptions } from './sinks.js';
export {
	callerLocation,
	ensure,
	failureMessage,
	reportFailure,
	verify,
	type SourceLocation,
} from './failure.js';
export {
	getLogEngine,
	initLogEngine,
	logError,
	logFile,
	logNote,
	logScreen,
	logWarning,
	shutdownOnExit,
} from './global.js';
export { NodeProcessLauncher } from './launcher.js';
export { NodeFileSystem } from './node-fs.js';
