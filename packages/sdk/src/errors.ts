/**
 * Error types shared by every chanlog package.
 */

export type ChanlogErrorCode = 'CONTRACT_VIOLATION' | 'CHECK_FAILED' | 'CONFIG_ERROR';

/** Base class for all chanlog errors */
export class ChanlogError extends Error {
	readonly code: ChanlogErrorCode;

	constructor(code: ChanlogErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ChanlogError';
		this.code = code;
	}
}

/**
 * A caller broke the engine's contract: writing to a closed channel,
 * querying an undefined channel, or rendering an oversized message.
 */
export class ContractViolationError extends ChanlogError {
	constructor(message: string, options?: ErrorOptions) {
		super('CONTRACT_VIOLATION', message, options);
		this.name = 'ContractViolationError';
	}
}

/** Raised by the failure handler when a checked condition does not hold. */
export class CheckFailedError extends ChanlogError {
	constructor(message: string, options?: ErrorOptions) {
		super('CHECK_FAILED', message, options);
		this.name = 'CheckFailedError';
	}
}

export class ConfigError extends ChanlogError {
	readonly field: string;

	constructor(field: string, message: string, options?: ErrorOptions) {
		super('CONFIG_ERROR', `${field}: ${message}`, options);
		this.name = 'ConfigError';
		this.field = field;
	}
}
