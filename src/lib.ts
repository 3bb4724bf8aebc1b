// ---------------------------------------------------------------------------
// snippets-app — public library API
//
// Storage backends, the selector, configuration, errors and the logger, for
// embedding the snippet store without going through the CLI.
// ---------------------------------------------------------------------------

// ---- CLI ------------------------------------------------------------------
export { type CLICommand, parseCLIArgs } from './cli/args.js';
export {
	type CommandContext,
	type CommandOutcome,
	runCommand,
} from './cli/commands.js';
export {
	type ContentStream,
	type DownloadOptions,
	downloadContent,
	type FetchFn,
	readStdin,
} from './cli/content.js';
export { type CLIIO, type OutputStream, runCli } from './cli/main.js';
// ---- Config ---------------------------------------------------------------
export {
	DEFAULT_LOG_LEVEL,
	DEFAULT_LOG_PATH,
	ENV_ATOMIC_WRITE,
	ENV_LOG_LEVEL,
	ENV_LOG_PATH,
	ENV_STORAGE,
	type Environment,
	loadSnippetsConfig,
	type SnippetsConfig,
} from './config/settings.js';
// ---- Errors ---------------------------------------------------------------
export * from './errors/index.js';
// ---- Logger ---------------------------------------------------------------
export {
	createConsoleTransport,
	createFileTransport,
	createLogger,
	createMemoryTransport,
	formatLogLine,
	getDefaultLogger,
	type LogEntry,
	type Logger,
	type LoggerOptions,
	type LogLevel,
	type LogTransport,
	type MemoryTransportHandle,
	setDefaultLogger,
} from './logger.js';
// ---- Snippets -------------------------------------------------------------
export { formatTimestamp, parseTimestamp } from './snippets/timestamp.js';
export {
	createSnippet,
	type Snippet,
	type SnippetCollection,
} from './snippets/types.js';
// ---- Storage --------------------------------------------------------------
export {
	createJsonStorage,
	type JsonStorageOptions,
} from './storage/json-storage.js';
export {
	type CreateStorageOptions,
	createStorage,
	parseStorageSpec,
	type StorageSpec,
} from './storage/selector.js';
export {
	createSqliteStorage,
	type SqliteStorageOptions,
} from './storage/sqlite-storage.js';
export {
	type SnippetStorage,
	STORAGE_KINDS,
	type StorageKind,
} from './storage/types.js';
