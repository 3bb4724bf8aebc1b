// ---------------------------------------------------------------------------
// CLI Errors — argument parsing and snippet content sources
// ---------------------------------------------------------------------------

import type { SnippetsError } from './base.js';
import { createSnippetsError, isSnippetsError } from './base.js';

export const createUsageError = (message: string): SnippetsError =>
	createSnippetsError(message, {
		name: 'UsageError',
		code: 'CLI_USAGE',
		exitCode: 2,
	});

export const createFetchError = (
	url: string,
	reason: string,
	options: { cause?: unknown; status?: number } = {},
): SnippetsError =>
	createSnippetsError(`Failed to download snippet from ${url}: ${reason}`, {
		name: 'FetchError',
		code: 'FETCH_ERROR',
		cause: options.cause,
		metadata:
			options.status !== undefined
				? { url, status: options.status }
				: { url },
	});

export const createStdinReadError = (
	options: { cause?: unknown } = {},
): SnippetsError =>
	createSnippetsError('Failed to read snippet content from standard input', {
		name: 'StdinReadError',
		code: 'STDIN_READ',
		cause: options.cause,
	});

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isUsageError = (value: unknown): value is SnippetsError =>
	isSnippetsError(value) && value.code === 'CLI_USAGE';

export const isFetchError = (value: unknown): value is SnippetsError =>
	isSnippetsError(value) && value.code === 'FETCH_ERROR';

export const isStdinReadError = (value: unknown): value is SnippetsError =>
	isSnippetsError(value) && value.code === 'STDIN_READ';
