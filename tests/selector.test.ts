import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { isConfigError, isStorageInitError } from '../src/errors/index.js';
import { createStorage, parseStorageSpec } from '../src/storage/selector.js';
import { createTempDir, createTestLogger, snippetAt } from './utils/mocks.js';

const temp = createTempDir('selector');

afterAll(() => {
	temp.cleanup();
});

const thrown = (fn: () => unknown): unknown => {
	try {
		fn();
	} catch (err) {
		return err;
	}
	return undefined;
};

describe('parseStorageSpec', () => {
	it('should split kind and location', () => {
		expect(parseStorageSpec('JSON:/tmp/s.json')).toEqual({
			kind: 'JSON',
			location: '/tmp/s.json',
		});
		expect(parseStorageSpec('SQLITE:data/s.db')).toEqual({
			kind: 'SQLITE',
			location: 'data/s.db',
		});
	});

	it('should keep colons after the first one in the location', () => {
		expect(parseStorageSpec('JSON:C:\\snippets\\s.json')).toEqual({
			kind: 'JSON',
			location: 'C:\\snippets\\s.json',
		});
	});

	it('should reject a value without a separator', () => {
		const error = thrown(() => parseStorageSpec('/tmp/s.json'));
		expect(isConfigError(error)).toBe(true);
		expect(error instanceof Error ? error.message : '').toBe(
			"Invalid storage '/tmp/s.json': expected JSON:<path> or SQLITE:<path>",
		);
	});

	it('should reject an unknown kind', () => {
		const error = thrown(() => parseStorageSpec('REDIS:localhost'));
		expect(isConfigError(error)).toBe(true);
		expect(error instanceof Error ? error.message : '').toBe(
			"Unknown storage provider 'REDIS': expected JSON:<path> or SQLITE:<path>",
		);
	});

	it('should match kinds case-sensitively', () => {
		expect(isConfigError(thrown(() => parseStorageSpec('json:s.json')))).toBe(
			true,
		);
	});

	it('should reject an empty location', () => {
		const error = thrown(() => parseStorageSpec('SQLITE:'));
		expect(isConfigError(error)).toBe(true);
		expect(error instanceof Error ? error.message : '').toBe(
			'Storage location for SQLITE cannot be empty',
		);
	});
});

describe('createStorage', () => {
	it('should construct a JSON backend', async () => {
		const path = join(temp.dir, 'a.json');
		const storage = createStorage(`JSON:${path}`);

		expect(storage.kind).toBe('JSON');
		expect(storage.location).toBe(path);
		expect((await storage.load()).size).toBe(0);
	});

	it('should construct a SQLite backend and create its file', async () => {
		const path = join(temp.dir, 'a.db');
		const storage = createStorage(`SQLITE:${path}`);

		expect(storage.kind).toBe('SQLITE');
		expect(existsSync(path)).toBe(true);
		await storage.close();
	});

	it('should construct nothing when the value is invalid', () => {
		const path = join(temp.dir, 'never.db');
		const error = thrown(() => createStorage(`SQLITE${path}`));

		expect(isConfigError(error)).toBe(true);
		expect(existsSync(path)).toBe(false);
	});

	it('should propagate SQLite construction failures as StorageInitError', () => {
		const error = thrown(() =>
			createStorage(`SQLITE:${join(temp.dir, 'no', 'such', 'dir.db')}`),
		);
		expect(isStorageInitError(error)).toBe(true);
	});

	it('should forward atomicWrite to the JSON backend', async () => {
		const path = join(temp.dir, 'atomic.json');
		const storage = createStorage(`JSON:${path}`, { atomicWrite: true });

		await storage.save(
			new Map([['a', snippetAt('x', '2024-01-01T00:00:00.000Z')]]),
		);
		expect(existsSync(path)).toBe(true);
		expect(existsSync(`${path}.tmp`)).toBe(false);
	});

	it('should log the selected backend', () => {
		const { logger, transport } = createTestLogger();
		createStorage(`JSON:${join(temp.dir, 'logged.json')}`, { logger });

		expect(transport.entries[0].message).toBe('Selected storage');
		expect(transport.entries[0].metadata).toEqual({
			kind: 'JSON',
			location: join(temp.dir, 'logged.json'),
		});
	});
});
