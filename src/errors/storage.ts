// ---------------------------------------------------------------------------
// Storage Errors — backend construction, load and save failures
// ---------------------------------------------------------------------------

import type { SnippetsError } from './base.js';
import { createSnippetsError, isSnippetsError } from './base.js';

export type StorageErrorWithLocation = SnippetsError & {
	readonly location: string;
};

const createStorageError = (
	message: string,
	location: string,
	options: {
		name: string;
		code: string;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	},
): StorageErrorWithLocation => {
	const err = createSnippetsError(message, {
		name: options.name,
		code: options.code,
		cause: options.cause,
		metadata: { location, ...options.metadata },
	});

	return Object.defineProperty(Object.assign(err, { location }), 'location', {
		writable: false,
		enumerable: true,
	});
};

export const createStorageInitError = (
	kind: string,
	location: string,
	options: { cause?: unknown } = {},
): StorageErrorWithLocation =>
	createStorageError(
		`Failed to open ${kind} storage '${location}'`,
		location,
		{
			name: 'StorageInitError',
			code: 'STORAGE_INIT',
			cause: options.cause,
			metadata: { kind },
		},
	);

export const createStorageReadError = (
	location: string,
	reason: string,
	options: { cause?: unknown } = {},
): StorageErrorWithLocation =>
	createStorageError(
		`Cannot read snippets from '${location}': ${reason}`,
		location,
		{
			name: 'StorageReadError',
			code: 'STORAGE_READ',
			cause: options.cause,
			metadata: { reason },
		},
	);

export const createStorageWriteError = (
	location: string,
	reason: string,
	options: { cause?: unknown } = {},
): StorageErrorWithLocation =>
	createStorageError(
		`Cannot write snippets to '${location}': ${reason}`,
		location,
		{
			name: 'StorageWriteError',
			code: 'STORAGE_WRITE',
			cause: options.cause,
			metadata: { reason },
		},
	);

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isStorageError = (
	value: unknown,
): value is StorageErrorWithLocation =>
	isSnippetsError(value) && value.code.startsWith('STORAGE_');

export const isStorageInitError = (
	value: unknown,
): value is StorageErrorWithLocation =>
	isSnippetsError(value) && value.code === 'STORAGE_INIT';

export const isStorageReadError = (
	value: unknown,
): value is StorageErrorWithLocation =>
	isSnippetsError(value) && value.code === 'STORAGE_READ';

export const isStorageWriteError = (
	value: unknown,
): value is StorageErrorWithLocation =>
	isSnippetsError(value) && value.code === 'STORAGE_WRITE';
