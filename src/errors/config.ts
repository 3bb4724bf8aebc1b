// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

import type { SnippetsError } from './base.js';
import { createSnippetsError, errorMessage, isSnippetsError } from './base.js';

export interface ConfigIssue {
	readonly path: string;
	readonly message: string;
}

export const createConfigError = (
	message: string,
	options: {
		code?: string;
		cause?: unknown;
		metadata?: Record<string, unknown>;
	} = {},
): SnippetsError =>
	createSnippetsError(message, {
		name: 'ConfigurationError',
		code: options.code ?? 'CONFIG_ERROR',
		cause: options.cause,
		metadata: options.metadata,
	});

export const createConfigMissingError = (variable: string): SnippetsError =>
	createConfigError(`Environment variable ${variable} is not set`, {
		code: 'CONFIG_MISSING',
		metadata: { variable },
	});

export const createConfigLogPathError = (
	path: string,
	cause: unknown,
): SnippetsError =>
	createConfigError(
		`Cannot open log file '${path}': ${errorMessage(cause)}`,
		{ code: 'CONFIG_LOG_PATH', cause, metadata: { path } },
	);

export const createConfigValidationError = (
	issues: readonly ConfigIssue[],
): SnippetsError & { readonly issues: readonly ConfigIssue[] } => {
	const summary =
		issues.length === 1
			? issues[0].message
			: `${issues.length} validation errors`;

	const frozenIssues = Object.freeze([...issues]);

	const err = createConfigError(`Invalid configuration: ${summary}`, {
		code: 'CONFIG_VALIDATION',
		metadata: { issues: frozenIssues },
	});

	return Object.defineProperty(
		Object.assign(err, { issues: frozenIssues }),
		'issues',
		{ writable: false, enumerable: true },
	);
};

// ---------------------------------------------------------------------------
// Type Guards
// ---------------------------------------------------------------------------

export const isConfigError = (value: unknown): value is SnippetsError =>
	isSnippetsError(value) && value.code.startsWith('CONFIG_');

export const isConfigMissingError = (value: unknown): value is SnippetsError =>
	isSnippetsError(value) && value.code === 'CONFIG_MISSING';

export const isConfigLogPathError = (value: unknown): value is SnippetsError =>
	isSnippetsError(value) && value.code === 'CONFIG_LOG_PATH';

export const isConfigValidationError = (
	value: unknown,
): value is SnippetsError & { readonly issues: readonly ConfigIssue[] } =>
	isSnippetsError(value) && value.code === 'CONFIG_VALIDATION';
