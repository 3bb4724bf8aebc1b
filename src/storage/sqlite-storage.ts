/**
 * snippets-app — SQLite Storage Backend
 *
 * One `snippets` table, one row per snippet, timestamps stored as RFC 3339
 * text. Saving clears the table and inserts every entry again.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import {
	createStorageInitError,
	createStorageReadError,
	createStorageWriteError,
	errorMessage,
} from '../errors/index.js';
import { getDefaultLogger, type Logger } from '../logger.js';
import { formatTimestamp, parseTimestamp } from '../snippets/timestamp.js';
import {
	createSnippet,
	type Snippet,
	type SnippetCollection,
} from '../snippets/types.js';
import type { SnippetStorage } from './types.js';

export interface SqliteStorageOptions {
	/** Path to the database file; created if missing. */
	readonly path: string;
	readonly logger?: Logger;
}

const SCHEMA = `CREATE TABLE IF NOT EXISTS snippets (
	name TEXT PRIMARY KEY,
	content TEXT NOT NULL,
	created_at TEXT NOT NULL
)`;

const rowSchema = z.object({
	name: z.string(),
	content: z.string(),
	created_at: z.string(),
});

/**
 * Open (or create) the database and make sure the table exists.
 * Throws a StorageInitError when the file cannot be opened as SQLite.
 */
export function createSqliteStorage(
	options: SqliteStorageOptions,
): SnippetStorage {
	const logger = options.logger ?? getDefaultLogger().child('sqlite-storage');

	let db: Database.Database;
	try {
		db = new Database(options.path);
	} catch (error) {
		throw createStorageInitError('SQLITE', options.path, { cause: error });
	}
	try {
		db.exec(SCHEMA);
	} catch (error) {
		db.close();
		throw createStorageInitError('SQLITE', options.path, { cause: error });
	}
	logger.debug('Opened database', { path: options.path });

	const load = async (): Promise<SnippetCollection> => {
		let rows: unknown[];
		try {
			rows = db.prepare('SELECT name, content, created_at FROM snippets').all();
		} catch (error) {
			throw createStorageReadError(options.path, errorMessage(error), {
				cause: error,
			});
		}

		const collection: SnippetCollection = new Map();
		for (const value of rows) {
			const row = rowSchema.safeParse(value);
			if (!row.success) {
				throw createStorageReadError(options.path, 'malformed snippet row', {
					cause: row.error,
				});
			}

			const createdAt = parseTimestamp(row.data.created_at);
			if (!createdAt) {
				throw createStorageReadError(
					options.path,
					`snippet '${row.data.name}' has an invalid created_at '${row.data.created_at}'`,
				);
			}
			collection.set(row.data.name, createSnippet(row.data.content, createdAt));
		}

		logger.debug('Loaded snippets', {
			path: options.path,
			count: collection.size,
		});
		return collection;
	};

	// Delete-then-insert runs without an explicit transaction; a concurrent
	// reader may observe an empty table.
	const save = async (collection: ReadonlyMap<string, Snippet>): Promise<void> => {
		try {
			db.prepare('DELETE FROM snippets').run();
			const insert = db.prepare(
				'INSERT INTO snippets (name, content, created_at) VALUES (?, ?, ?)',
			);
			for (const [name, snippet] of collection) {
				insert.run(name, snippet.content, formatTimestamp(snippet.createdAt));
			}
		} catch (error) {
			throw createStorageWriteError(options.path, errorMessage(error), {
				cause: error,
			});
		}

		logger.debug('Saved snippets', {
			path: options.path,
			count: collection.size,
		});
	};

	const close = async (): Promise<void> => {
		if (db.open) db.close();
	};

	return Object.freeze({
		kind: 'SQLITE',
		location: options.path,
		load,
		save,
		close,
	});
}
