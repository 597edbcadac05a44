/**
 * @chanlog/sdk: channel policies, message formatting and the collaborator
 * interfaces the engine writes through.
 */

export {
	Channel,
	CHANNELS,
	CHANNEL_POLICIES,
	channelName,
	isChannel,
	parseChannel,
	policyOf,
	type ChannelPolicy,
	type OutputTarget,
} from './channels.js';

export { ChanlogError, CheckFailedError, ConfigError, ContractViolationError, type ChanlogErrorCode } from './errors.js';

export {
	BoundedWriter,
	LOG_BUFFER_SIZE,
	MAX_MESSAGE_SIZE,
	MAX_STATUS_SIZE,
	MessageFormatter,
	formatAsctime,
	normalizeInto,
	normalizeLineEndings,
	utf8Boundary,
} from './format.js';

export {
	FileFlags,
	type FileFlagSet,
	type FileHandle,
	type FileSystem,
	type OutputStream,
	type ProcessLauncher,
} from './io.js';

export { MemoryFileSystem, MemoryStream, MockLauncher } from './testing.js';
