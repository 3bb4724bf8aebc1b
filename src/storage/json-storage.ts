/**
 * snippets-app — JSON File Storage Backend
 *
 * Stores the whole collection as one pretty-printed JSON object mapping
 * snippet name → `{ content, created_at }`. Every save rewrites the file.
 */

import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import {
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

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface JsonStorageOptions {
	/** Absolute or relative path to the JSON file. */
	readonly path: string;
	/**
	 * Write to `<path>.tmp` and rename it over the target instead of
	 * truncating the file in place. Defaults to `false`.
	 */
	readonly atomicWrite?: boolean;
	readonly logger?: Logger;
}

// ---------------------------------------------------------------------------
// File format
// ---------------------------------------------------------------------------

const storedSnippetSchema = z.object({
	content: z.string(),
	created_at: z.string(),
});

type StoredSnippet = z.infer<typeof storedSnippetSchema>;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === 'object' && value !== null && !Array.isArray(value);

function decode(raw: string, location: string): SnippetCollection {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw createStorageReadError(location, errorMessage(error), {
			cause: error,
		});
	}

	if (!isPlainObject(parsed)) {
		throw createStorageReadError(
			location,
			'expected an object mapping snippet names to snippets',
		);
	}

	const collection: SnippetCollection = new Map();
	// Object.entries keeps an own "__proto__" key that JSON.parse produced.
	for (const [name, value] of Object.entries(parsed)) {
		const entry = storedSnippetSchema.safeParse(value);
		if (!entry.success) {
			throw createStorageReadError(
				location,
				`snippet '${name}' is malformed`,
				{ cause: entry.error },
			);
		}

		const createdAt = parseTimestamp(entry.data.created_at);
		if (!createdAt) {
			throw createStorageReadError(
				location,
				`snippet '${name}' has an invalid created_at '${entry.data.created_at}'`,
			);
		}

		collection.set(name, createSnippet(entry.data.content, createdAt));
	}
	return collection;
}

function encode(collection: ReadonlyMap<string, Snippet>): string {
	const stored = Object.fromEntries(
		Array.from(
			collection,
			([name, snippet]): [string, StoredSnippet] => [
				name,
				{
					content: snippet.content,
					created_at: formatTimestamp(snippet.createdAt),
				},
			],
		),
	);
	return `${JSON.stringify(stored, null, '\t')}\n`;
}

// ---------------------------------------------------------------------------
// JSON storage backend
// ---------------------------------------------------------------------------

export function createJsonStorage(options: JsonStorageOptions): SnippetStorage {
	const filePath = resolve(process.cwd(), options.path);
	const tmpPath = `${filePath}.tmp`;
	const atomicWrite = options.atomicWrite ?? false;
	const logger = options.logger ?? getDefaultLogger().child('json-storage');

	const load = async (): Promise<SnippetCollection> => {
		if (!existsSync(filePath)) {
			logger.debug('Storage file does not exist yet', { path: filePath });
			return new Map();
		}

		let raw: string;
		try {
			raw = await readFile(filePath, 'utf-8');
		} catch (error) {
			throw createStorageReadError(options.path, errorMessage(error), {
				cause: error,
			});
		}

		const collection = decode(raw, options.path);
		logger.debug('Loaded snippets', { path: filePath, count: collection.size });
		return collection;
	};

	const save = async (collection: ReadonlyMap<string, Snippet>): Promise<void> => {
		const body = encode(collection);

		try {
			await mkdir(dirname(filePath), { recursive: true });
			if (atomicWrite) {
				await writeFile(tmpPath, body, 'utf-8');
				await rename(tmpPath, filePath);
			} else {
				await writeFile(filePath, body, 'utf-8');
			}
		} catch (error) {
			throw createStorageWriteError(options.path, errorMessage(error), {
				cause: error,
			});
		}

		logger.debug('Saved snippets', {
			path: filePath,
			count: collection.size,
			atomicWrite,
		});
	};

	const close = async (): Promise<void> => {
		if (existsSync(tmpPath)) {
			await rm(tmpPath, { force: true });
		}
	};

	return Object.freeze({
		kind: 'JSON',
		location: options.path,
		load,
		save,
		close,
	});
}
