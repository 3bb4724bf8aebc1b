// ---------------------------------------------------------------------------
// Structured Logger — Functional API
// ---------------------------------------------------------------------------
//
// Logger "instances" are frozen records of functions closing over a shared
// level and transport list. Transports decide where entries go: the console,
// an in-memory array for tests, or an append-only log file.
// ---------------------------------------------------------------------------

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS: readonly LogLevel[] = Object.freeze([
	'debug',
	'info',
	'warn',
	'error',
	'none',
]);

const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = Object.freeze({
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	none: 4,
});

export const isLogLevel = (value: string): value is LogLevel =>
	LOG_LEVELS.some((level) => level === value);

// ---------------------------------------------------------------------------
// Log Entry
// ---------------------------------------------------------------------------

export interface LogEntry {
	readonly level: LogLevel;
	readonly message: string;
	readonly timestamp: string;
	readonly context?: string;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

// ---------------------------------------------------------------------------
// Transport interface
// ---------------------------------------------------------------------------

export interface LogTransport {
	readonly write: (entry: LogEntry) => void;
}

const hasMetadata = (entry: LogEntry): boolean =>
	entry.metadata !== undefined && Object.keys(entry.metadata).length > 0;

/**
 * Render an entry as a single plain-text line:
 * `<timestamp> <LEVEL> [context] message {metadata}`.
 */
export const formatLogLine = (entry: LogEntry): string => {
	const parts = [entry.timestamp, entry.level.toUpperCase().padEnd(5)];
	if (entry.context) parts.push(`[${entry.context}]`);
	parts.push(entry.message);
	if (hasMetadata(entry)) parts.push(JSON.stringify(entry.metadata));
	return parts.join(' ');
};

// ---------------------------------------------------------------------------
// Built-in Transports (constructed via factory functions)
// ---------------------------------------------------------------------------

const levelColour = (
	chalk: ChalkInstance,
	level: LogLevel,
): ((text: string) => string) => {
	switch (level) {
		case 'debug':
			return chalk.gray;
		case 'info':
			return chalk.cyan;
		case 'warn':
			return chalk.yellow;
		case 'error':
			return chalk.red;
		case 'none':
			return chalk.reset;
	}
};

export interface ConsoleTransportOptions {
	/** Force colours on or off. Defaults to chalk's terminal detection. */
	readonly colors?: boolean;
}

/**
 * Create a transport that writes formatted log entries to the console.
 */
export const createConsoleTransport = (
	options: ConsoleTransportOptions = {},
): LogTransport => {
	const chalk =
		options.colors === undefined
			? new Chalk()
			: new Chalk({ level: options.colors ? 1 : 0 });

	return Object.freeze({
		write(entry: LogEntry): void {
			const prefix = entry.context ? `[${entry.context}]` : '';
			const tag = levelColour(chalk, entry.level)(
				entry.level.toUpperCase().padEnd(5),
			);
			const base = `${tag} ${entry.timestamp} ${prefix} ${entry.message}`;

			const logFn =
				entry.level === 'error'
					? console.error
					: entry.level === 'warn'
						? console.warn
						: entry.level === 'debug'
							? console.debug
							: console.log;

			if (hasMetadata(entry)) logFn(base, entry.metadata);
			else logFn(base);
		},
	});
};

/**
 * A transport backed by a mutable array, for tests. `entries` stays a plain
 * array so tests can inspect and clear it.
 */
export interface MemoryTransportHandle extends LogTransport {
	readonly entries: LogEntry[];
	readonly clear: () => void;
	readonly filter: (level: LogLevel) => readonly LogEntry[];
}

export const createMemoryTransport = (): MemoryTransportHandle => {
	const entries: LogEntry[] = [];

	return {
		entries,
		write(entry: LogEntry): void {
			entries.push(entry);
		},
		clear(): void {
			entries.length = 0;
		},
		filter(level: LogLevel): readonly LogEntry[] {
			return entries.filter((e) => e.level === level);
		},
	};
};

/**
 * Append one `formatLogLine` line per entry to `path`. The file and its
 * parent directory are created here, so an unusable path throws before
 * anything is logged. Writes are synchronous so nothing is lost when the
 * process exits right after a fatal error.
 */
export const createFileTransport = (path: string): LogTransport => {
	mkdirSync(dirname(path), { recursive: true });
	appendFileSync(path, '', 'utf-8');

	return Object.freeze({
		write(entry: LogEntry): void {
			appendFileSync(path, `${formatLogLine(entry)}\n`, 'utf-8');
		},
	});
};

// ---------------------------------------------------------------------------
// Logger interface — a record of functions
// ---------------------------------------------------------------------------

export interface Logger {
	readonly debug: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly info: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly warn: (
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	) => void;
	readonly error: (
		message: string,
		errorOrMetadata?: unknown,
	) => void;
	readonly child: (childContext: string) => Logger;
	readonly setLevel: (level: LogLevel) => void;
	readonly getLevel: () => LogLevel;
	readonly addTransport: (transport: LogTransport) => void;
	readonly clearTransports: () => void;
}

export interface LoggerOptions {
	readonly context?: string;
	readonly level?: LogLevel;
	readonly transports?: readonly LogTransport[];
}

// ---------------------------------------------------------------------------
// createLogger — the primary factory
// ---------------------------------------------------------------------------

const describeCause = (cause: unknown): string =>
	cause instanceof Error ? cause.message : String(cause);

const isMetadataRecord = (
	value: unknown,
): value is Readonly<Record<string, unknown>> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

const resolveErrorMetadata = (
	errorOrMetadata: unknown,
): Readonly<Record<string, unknown>> | undefined => {
	if (errorOrMetadata === undefined) return undefined;

	if (errorOrMetadata instanceof Error) {
		const code =
			'code' in errorOrMetadata && typeof errorOrMetadata.code === 'string'
				? { errorCode: errorOrMetadata.code }
				: {};
		return {
			errorName: errorOrMetadata.name,
			errorMessage: errorOrMetadata.message,
			...code,
			stack: errorOrMetadata.stack,
			...(errorOrMetadata.cause != null
				? { cause: describeCause(errorOrMetadata.cause) }
				: {}),
		};
	}

	if (isMetadataRecord(errorOrMetadata)) return errorOrMetadata;
	return { error: String(errorOrMetadata) };
};

/**
 * Shared mutable state so that parent and child loggers see the same level
 * and transport list.
 */
interface LoggerState {
	level: LogLevel;
	readonly transports: LogTransport[];
}

const buildLogger = (
	context: string | undefined,
	state: LoggerState,
): Logger => {
	const log = (
		level: LogLevel,
		message: string,
		metadata?: Readonly<Record<string, unknown>>,
	): void => {
		if (level === 'none') return;
		if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[state.level]) return;

		const entry: LogEntry = Object.freeze({
			level,
			message,
			timestamp: new Date().toISOString(),
			context,
			metadata,
		});

		for (const transport of state.transports) {
			transport.write(entry);
		}
	};

	return Object.freeze({
		debug: (message, metadata?) => log('debug', message, metadata),
		info: (message, metadata?) => log('info', message, metadata),
		warn: (message, metadata?) => log('warn', message, metadata),
		error: (message, errorOrMetadata?) =>
			log('error', message, resolveErrorMetadata(errorOrMetadata)),

		child: (childContext: string): Logger =>
			buildLogger(
				context ? `${context}:${childContext}` : childContext,
				state,
			),

		setLevel: (level: LogLevel): void => {
			state.level = level;
		},
		getLevel: (): LogLevel => state.level,

		addTransport: (transport: LogTransport): void => {
			state.transports.push(transport);
		},
		clearTransports: (): void => {
			state.transports.length = 0;
		},
	} satisfies Logger);
};

export const createLogger = (options: LoggerOptions = {}): Logger =>
	buildLogger(options.context, {
		level: options.level ?? 'info',
		transports: options.transports
			? [...options.transports]
			: [createConsoleTransport()],
	});

// ---------------------------------------------------------------------------
// Default singleton
// ---------------------------------------------------------------------------

let _defaultLogger: Logger | undefined;

/**
 * Get (or create) the default application-wide logger.
 * Call `setDefaultLogger()` to replace it.
 */
export const getDefaultLogger = (): Logger => {
	if (!_defaultLogger) {
		_defaultLogger = createLogger({ context: 'snippets' });
	}
	return _defaultLogger;
};

/**
 * Replace the default application-wide logger.
 */
export const setDefaultLogger = (logger: Logger): void => {
	_defaultLogger = logger;
};
