// ---------------------------------------------------------------------------
// Error barrel — re-exports all error factories, type guards, and utilities
// ---------------------------------------------------------------------------

export {
	createSnippetsError,
	errorMessage,
	isSnippetsError,
	type SnippetsError,
	type SnippetsErrorOptions,
	toError,
	wrapError,
} from './base.js';
export {
	createFetchError,
	createStdinReadError,
	createUsageError,
	isFetchError,
	isStdinReadError,
	isUsageError,
} from './cli.js';
export {
	type ConfigIssue,
	createConfigError,
	createConfigLogPathError,
	createConfigMissingError,
	createConfigValidationError,
	isConfigError,
	isConfigLogPathError,
	isConfigMissingError,
	isConfigValidationError,
} from './config.js';
export {
	createStorageInitError,
	createStorageReadError,
	createStorageWriteError,
	isStorageError,
	isStorageInitError,
	isStorageReadError,
	isStorageWriteError,
	type StorageErrorWithLocation,
} from './storage.js';
