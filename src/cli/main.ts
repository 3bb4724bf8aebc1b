// ---------------------------------------------------------------------------
// snippets-app CLI — one command per process
// ---------------------------------------------------------------------------

import type { Environment, SnippetsConfig } from '../config/settings.js';
import { loadSnippetsConfig } from '../config/settings.js';
import {
	createConfigLogPathError,
	errorMessage,
	isConfigValidationError,
	isSnippetsError,
	isUsageError,
} from '../errors/index.js';
import {
	createFileTransport,
	createLogger,
	type Logger,
	type LogTransport,
	setDefaultLogger,
} from '../logger.js';
import { createStorage } from '../storage/selector.js';
import type { SnippetStorage } from '../storage/types.js';
import { parseCLIArgs } from './args.js';
import { runCommand } from './commands.js';
import {
	type ContentStream,
	downloadContent,
	type FetchFn,
	readStdin,
} from './content.js';
import {
	createColors,
	renderError,
	shouldUseColor,
	type TermColors,
	USAGE_TEXT,
} from './ui.js';

export interface OutputStream {
	readonly write: (chunk: string) => unknown;
	readonly isTTY?: boolean;
}

export interface CLIIO {
	readonly env: Environment;
	readonly stdin: ContentStream;
	readonly stdout: OutputStream;
	readonly stderr: OutputStream;
	/** Defaults to the global `fetch`. */
	readonly fetch?: FetchFn;
	/** Clock for snippet creation times. Defaults to `new Date()`. */
	readonly now?: () => Date;
}

const exitCodeOf = (error: unknown): number =>
	isSnippetsError(error) ? error.exitCode : 1;

function reportError(
	error: unknown,
	io: CLIIO,
	colors: TermColors,
): void {
	io.stderr.write(`${renderError(errorMessage(error), colors)}\n`);
	if (isConfigValidationError(error)) {
		for (const issue of error.issues) {
			io.stderr.write(`  ${issue.path}: ${issue.message}\n`);
		}
	}
	if (isUsageError(error)) {
		io.stderr.write(`\n${USAGE_TEXT}\n`);
	}
}

/** Level `none` never touches the log file. */
function openLogTransports(config: SnippetsConfig): LogTransport[] {
	if (config.logLevel === 'none') return [];
	try {
		return [createFileTransport(config.logPath)];
	} catch (error) {
		throw createConfigLogPathError(config.logPath, error);
	}
}

/** Run a logging call; a failing transport is reported on stderr instead. */
function logSafely(log: () => void, io: CLIIO, colors: TermColors): void {
	try {
		log();
	} catch (error) {
		io.stderr.write(
			`${renderError(`Cannot write log: ${errorMessage(error)}`, colors)}\n`,
		);
	}
}

async function closeStorage(
	storage: SnippetStorage,
	logger: Logger,
	io: CLIIO,
	colors: TermColors,
): Promise<void> {
	try {
		await storage.close();
	} catch (error) {
		logSafely(
			() =>
				logger.warn('Failed to close storage', {
					kind: storage.kind,
					location: storage.location,
					error: errorMessage(error),
				}),
			io,
			colors,
		);
	}
}

/**
 * Run one CLI invocation. `args` excludes the executable and script path.
 * Resolves to the process exit code; fatal errors are reported on stderr
 * and never rejected.
 */
export async function runCli(
	args: readonly string[],
	io: CLIIO,
): Promise<number> {
	const colors = createColors({ enabled: shouldUseColor(io.stderr, io.env) });
	const print = (line: string): void => {
		io.stdout.write(`${line}\n`);
	};

	let command: ReturnType<typeof parseCLIArgs>;
	let config: SnippetsConfig;
	let transports: LogTransport[];
	try {
		command = parseCLIArgs(args);
		if (command.type === 'usage') {
			print(USAGE_TEXT);
			return 0;
		}
		config = loadSnippetsConfig(io.env);
		transports = openLogTransports(config);
	} catch (error) {
		reportError(error, io, colors);
		return exitCodeOf(error);
	}

	const logger = createLogger({
		context: 'snippets',
		level: config.logLevel,
		transports,
	});
	setDefaultLogger(logger);

	let storage: SnippetStorage | undefined;
	try {
		storage = createStorage(config.storage, {
			atomicWrite: config.atomicWrite,
			logger,
		});
		const collection = await storage.load();
		logger.debug('Loaded snippets', { count: collection.size });

		await runCommand(command, {
			storage,
			collection,
			readContent: () => readStdin(io.stdin),
			download: (url) => downloadContent(url, { fetch: io.fetch }),
			now: io.now ?? (() => new Date()),
			print,
			logger,
		});
		return 0;
	} catch (error) {
		logSafely(() => logger.error('Command failed', error), io, colors);
		reportError(error, io, colors);
		return exitCodeOf(error);
	} finally {
		if (storage) await closeStorage(storage, logger, io, colors);
	}
}
