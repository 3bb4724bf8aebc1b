import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterAll, describe, expect, it, vi } from 'vitest';
import { type CLIIO, runCli } from '../src/cli/main.js';
import { USAGE_TEXT } from '../src/cli/ui.js';
import { createSqliteStorage } from '../src/storage/sqlite-storage.js';
import {
	captureOutput,
	createTempDir,
	createTestLogger,
	streamOf,
} from './utils/mocks.js';

const temp = createTempDir('cli');

afterAll(() => {
	temp.cleanup();
});

const NOW = new Date('2024-06-01T12:00:00.000Z');

interface Invocation {
	readonly code: number;
	readonly stdout: string;
	readonly stderr: string;
}

const invoke = async (
	args: readonly string[],
	env: CLIIO['env'],
	overrides: Partial<CLIIO> = {},
): Promise<Invocation> => {
	const stdout = captureOutput();
	const stderr = captureOutput();
	const code = await runCli(args, {
		env,
		stdin: streamOf(),
		stdout,
		stderr,
		now: () => NOW,
		...overrides,
	});
	return { code, stdout: stdout.text(), stderr: stderr.text() };
};

const envFor = (storage: string, logName = 'app.log') => ({
	SNIPPETS_APP_STORAGE: storage,
	SNIPPETS_APP_LOG_PATH: join(temp.dir, logName),
});

describe('runCli', () => {
	it('should print usage and succeed without arguments or config', async () => {
		const result = await invoke([], {});

		expect(result).toEqual({
			code: 0,
			stdout: `${USAGE_TEXT}\n`,
			stderr: '',
		});
	});

	it('should store stdin and read it back from a JSON file', async () => {
		const env = envFor(`JSON:${join(temp.dir, 's.json')}`);

		const created = await invoke(['--name', 'greeting'], env, {
			stdin: streamOf('hello world'),
		});
		expect(created).toEqual({ code: 0, stdout: 'Snippet saved.\n', stderr: '' });

		const read = await invoke(['--read', 'greeting'], env);
		expect(read).toEqual({
			code: 0,
			stdout: 'Created at: 2024-06-01T12:00:00.000Z\nhello world\n',
			stderr: '',
		});
	});

	it('should report a missing snippet and still succeed', async () => {
		const env = envFor(`JSON:${join(temp.dir, 'empty.json')}`);

		const result = await invoke(['--read', 'missing'], env);
		expect(result).toEqual({
			code: 0,
			stdout: 'Snippet not found.\n',
			stderr: '',
		});
	});

	it('should keep only the remaining snippet in SQLite after a delete', async () => {
		const path = join(temp.dir, 's.db');
		const env = envFor(`SQLITE:${path}`);

		expect(
			(await invoke(['--name', 'a'], env, { stdin: streamOf('first') })).code,
		).toBe(0);
		expect(
			(await invoke(['--name', 'b'], env, { stdin: streamOf('second') })).code,
		).toBe(0);
		expect(await invoke(['--delete', 'a'], env)).toEqual({
			code: 0,
			stdout: 'Snippet deleted.\n',
			stderr: '',
		});

		const storage = createSqliteStorage({
			path,
			logger: createTestLogger().logger,
		});
		const reloaded = await storage.load();
		await storage.close();

		expect([...reloaded.keys()]).toEqual(['b']);
		expect(reloaded.get('b')?.content).toBe('second');
	});

	it('should leave the store untouched when deleting a missing name', async () => {
		const path = join(temp.dir, 'untouched.json');
		const env = envFor(`JSON:${path}`);
		await invoke(['--name', 'keep'], env, { stdin: streamOf('kept') });
		const before = readFileSync(path, 'utf-8');

		const result = await invoke(['--delete', 'missing'], env);

		expect(result.stdout).toBe('Snippet not found.\n');
		expect(readFileSync(path, 'utf-8')).toBe(before);
	});

	it('should leave SQLite rows untouched when deleting a missing name', async () => {
		const path = join(temp.dir, 'untouched.db');
		const env = envFor(`SQLITE:${path}`);
		await invoke(['--name', 'keep'], env, { stdin: streamOf('kept') });

		const result = await invoke(['--delete', 'missing'], env);
		expect(result).toEqual({
			code: 0,
			stdout: 'Snippet not found.\n',
			stderr: '',
		});

		const storage = createSqliteStorage({
			path,
			logger: createTestLogger().logger,
		});
		const reloaded = await storage.load();
		await storage.close();

		expect([...reloaded.entries()]).toEqual([
			['keep', { content: 'kept', createdAt: NOW }],
		]);
	});

	it('should download content when --download is given', async () => {
		const env = envFor(`JSON:${join(temp.dir, 'download.json')}`);
		const fetch = vi.fn(async (_url: string) => new Response('remote body'));

		const created = await invoke(
			['--name', 'remote', '--download', 'https://example.test/r.txt'],
			env,
			{ fetch },
		);
		expect(created.stdout).toBe('Snippet saved.\n');
		expect(fetch).toHaveBeenCalledWith('https://example.test/r.txt');

		const read = await invoke(['--read', 'remote'], env);
		expect(read.stdout).toBe(
			'Created at: 2024-06-01T12:00:00.000Z\nremote body\n',
		);
	});

	it('should fail when the storage variable is missing', async () => {
		const result = await invoke(['--read', 'a'], {});

		expect(result).toEqual({
			code: 1,
			stdout: '',
			stderr: 'Error: Environment variable SNIPPETS_APP_STORAGE is not set\n',
		});
	});

	it('should fail on a malformed storage value', async () => {
		const result = await invoke(
			['--read', 'a'],
			envFor('MONGO:somewhere', 'bad-kind.log'),
		);

		expect(result.code).toBe(1);
		expect(result.stderr).toBe(
			"Error: Unknown storage provider 'MONGO': expected JSON:<path> or SQLITE:<path>\n",
		);
	});

	it('should list every configuration issue', async () => {
		const result = await invoke(['--read', 'a'], {
			SNIPPETS_APP_STORAGE: 'JSON:x.json',
			SNIPPETS_APP_LOG_LEVEL: 'loud',
		});

		expect(result.code).toBe(1);
		expect(result.stderr).toBe(
			"Error: Invalid configuration: Log level 'loud' must be one of debug, info, warn, error, none\n" +
				"  SNIPPETS_APP_LOG_LEVEL: Log level 'loud' must be one of debug, info, warn, error, none\n",
		);
	});

	it('should exit with code 2 and show usage on bad arguments', async () => {
		const result = await invoke(['--list'], {});

		expect(result.code).toBe(2);
		expect(result.stdout).toBe('');
		expect(result.stderr).toBe(
			`Error: Unknown option '--list'\n\n${USAGE_TEXT}\n`,
		);
	});

	it('should fail on a corrupt store and log the error', async () => {
		const path = join(temp.dir, 'corrupt.json');
		writeFileSync(path, 'not json at all');
		const env = envFor(`JSON:${path}`, 'corrupt.log');

		const result = await invoke(['--read', 'a'], env);

		expect(result.code).toBe(1);
		expect(result.stdout).toBe('');
		expect(result.stderr.startsWith(`Error: Cannot read snippets from '${path}': `)).toBe(true);

		const log = readFileSync(join(temp.dir, 'corrupt.log'), 'utf-8');
		expect(log).toContain(' ERROR [snippets] Command failed {"errorName":"StorageReadError"');
	});

	it('should fail before touching storage when the log path is a directory', async () => {
		const logDir = join(temp.dir, 'log-is-a-dir');
		mkdirSync(logDir);
		const storePath = join(temp.dir, 'never-created.json');
		const env = {
			SNIPPETS_APP_STORAGE: `JSON:${storePath}`,
			SNIPPETS_APP_LOG_PATH: logDir,
			SNIPPETS_APP_LOG_LEVEL: 'warn',
		};

		const result = await invoke(['--name', 'b'], env, {
			stdin: streamOf('body'),
		});

		expect(result.code).toBe(1);
		expect(result.stdout).toBe('');
		expect(
			result.stderr.startsWith(`Error: Cannot open log file '${logDir}': `),
		).toBe(true);
		expect(existsSync(storePath)).toBe(false);
	});

	it('should write nothing to the log at level none', async () => {
		const env = {
			...envFor(`JSON:${join(temp.dir, 'quiet.json')}`, 'quiet.log'),
			SNIPPETS_APP_LOG_LEVEL: 'none',
		};

		await invoke(['--name', 'q'], env, { stdin: streamOf('quiet') });

		expect(() => readFileSync(join(temp.dir, 'quiet.log'), 'utf-8')).toThrow();
	});
});
