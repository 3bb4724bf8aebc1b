// ---------------------------------------------------------------------------
// Configuration — environment → frozen SnippetsConfig
// ---------------------------------------------------------------------------

import {
	createConfigMissingError,
	createConfigValidationError,
} from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../logger.js';
import {
	combine,
	parseBooleanFlag,
	validateBooleanFlag,
	validateLogLevel,
	validateNonEmpty,
} from './schema.js';

export const ENV_STORAGE = 'SNIPPETS_APP_STORAGE';
export const ENV_LOG_LEVEL = 'SNIPPETS_APP_LOG_LEVEL';
export const ENV_LOG_PATH = 'SNIPPETS_APP_LOG_PATH';
export const ENV_ATOMIC_WRITE = 'SNIPPETS_APP_ATOMIC_WRITE';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
export const DEFAULT_LOG_PATH = 'snippets.log';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface SnippetsConfig {
	/** `KIND:location`, resolved into a backend by `createStorage`. */
	readonly storage: string;
	readonly logLevel: LogLevel;
	readonly logPath: string;
	/** Temp-file-and-rename saves for the JSON backend. */
	readonly atomicWrite: boolean;
}

/**
 * Read the configuration from environment variables.
 *
 * Throws a ConfigurationError when `SNIPPETS_APP_STORAGE` is unset, or when
 * any other variable holds an invalid value (all issues are reported
 * together).
 */
export function loadSnippetsConfig(env: Environment): SnippetsConfig {
	const storage = env[ENV_STORAGE];
	if (storage === undefined) {
		throw createConfigMissingError(ENV_STORAGE);
	}

	const logLevel = env[ENV_LOG_LEVEL];
	const logPath = env[ENV_LOG_PATH];
	const atomicWrite = env[ENV_ATOMIC_WRITE];

	const issues = combine(
		validateNonEmpty(storage, ENV_STORAGE, 'Storage'),
		validateLogLevel(logLevel, ENV_LOG_LEVEL),
		validateNonEmpty(logPath, ENV_LOG_PATH, 'Log path'),
		validateBooleanFlag(atomicWrite, ENV_ATOMIC_WRITE),
	);
	if (issues.length > 0) {
		throw createConfigValidationError(issues);
	}

	return Object.freeze({
		storage,
		logLevel:
			logLevel !== undefined && isLogLevel(logLevel)
				? logLevel
				: DEFAULT_LOG_LEVEL,
		logPath: logPath ?? DEFAULT_LOG_PATH,
		atomicWrite:
			atomicWrite !== undefined
				? (parseBooleanFlag(atomicWrite) ?? false)
				: false,
	});
}
