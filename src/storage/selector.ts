// ---------------------------------------------------------------------------
// Storage selector — `KIND:location` → constructed backend
// ---------------------------------------------------------------------------

import { createConfigError } from '../errors/index.js';
import type { Logger } from '../logger.js';
import { createJsonStorage } from './json-storage.js';
import { createSqliteStorage } from './sqlite-storage.js';
import { STORAGE_KINDS, type SnippetStorage, type StorageKind } from './types.js';

export interface StorageSpec {
	readonly kind: StorageKind;
	readonly location: string;
}

export interface CreateStorageOptions {
	/** Forwarded to the JSON backend. */
	readonly atomicWrite?: boolean;
	readonly logger?: Logger;
}

const EXPECTED_SHAPE = 'expected JSON:<path> or SQLITE:<path>';

const isStorageKind = (value: string): value is StorageKind =>
	STORAGE_KINDS.some((kind) => kind === value);

/**
 * Split a storage string at its first `:`. The location may itself contain
 * colons. Throws a ConfigurationError on a missing separator, an empty
 * location or an unknown kind.
 */
export function parseStorageSpec(value: string): StorageSpec {
	const separator = value.indexOf(':');
	if (separator === -1) {
		throw createConfigError(
			`Invalid storage '${value}': ${EXPECTED_SHAPE}`,
			{ metadata: { value } },
		);
	}

	const kind = value.slice(0, separator);
	const location = value.slice(separator + 1);

	if (!isStorageKind(kind)) {
		throw createConfigError(
			`Unknown storage provider '${kind}': ${EXPECTED_SHAPE}`,
			{ metadata: { value, kind } },
		);
	}
	if (location.length === 0) {
		throw createConfigError(
			`Storage location for ${kind} cannot be empty`,
			{ metadata: { value, kind } },
		);
	}

	return Object.freeze({ kind, location });
}

/**
 * Parse `value` and construct the backend it names. Nothing is constructed
 * when parsing fails; SQLite construction errors propagate unchanged.
 */
export function createStorage(
	value: string,
	options: CreateStorageOptions = {},
): SnippetStorage {
	const spec = parseStorageSpec(value);
	options.logger?.info('Selected storage', {
		kind: spec.kind,
		location: spec.location,
	});

	switch (spec.kind) {
		case 'JSON':
			return createJsonStorage({
				path: spec.location,
				atomicWrite: options.atomicWrite,
				logger: options.logger?.child('json-storage'),
			});
		case 'SQLITE':
			return createSqliteStorage({
				path: spec.location,
				logger: options.logger?.child('sqlite-storage'),
			});
	}
}
