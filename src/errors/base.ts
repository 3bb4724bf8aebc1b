// ---------------------------------------------------------------------------
// SnippetsError — base interface, factory, type guard, and utilities
// ---------------------------------------------------------------------------

/**
 * Shape of every error produced by snippets-app. Consumers discriminate
 * errors via the `code` field and the type guards exported from sibling
 * modules.
 */
export interface SnippetsError extends Error {
	/** Machine-readable error code (e.g. "CONFIG_MISSING", "STORAGE_READ"). */
	readonly code: string;
	/** Process exit code the CLI terminates with when this error is fatal. */
	readonly exitCode: number;
	/** Arbitrary structured context attached to the error. */
	readonly metadata: Record<string, unknown>;
	/** Return a plain-object representation suitable for logging. */
	readonly toJSON: () => Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Options type shared by all factory helpers
// ---------------------------------------------------------------------------

export interface SnippetsErrorOptions {
	readonly name?: string;
	readonly code?: string;
	readonly exitCode?: number;
	readonly cause?: unknown;
	readonly metadata?: Readonly<Record<string, unknown>>;
}

const describeCause = (cause: unknown): unknown => {
	if (cause instanceof Error) {
		return { name: cause.name, message: cause.message };
	}
	return cause;
};

// ---------------------------------------------------------------------------
// Base factory
// ---------------------------------------------------------------------------

/**
 * Create a `SnippetsError`: a plain `Error` augmented with structured,
 * read-only fields.
 */
export const createSnippetsError = (
	message: string,
	options: SnippetsErrorOptions = {},
): SnippetsError => {
	const err = new Error(message, { cause: options.cause });

	err.name = options.name ?? 'SnippetsError';
	const code = options.code ?? 'SNIPPETS_ERROR';
	const exitCode = options.exitCode ?? 1;
	const metadata = { ...options.metadata };

	const toJSON = (): Record<string, unknown> => ({
		name: err.name,
		code,
		message: err.message,
		exitCode,
		metadata,
		cause: describeCause(err.cause),
		stack: err.stack,
	});

	const augmented = Object.assign(err, { code, exitCode, metadata, toJSON });

	Object.defineProperties(augmented, {
		code: { writable: false, enumerable: true },
		exitCode: { writable: false, enumerable: true },
		metadata: { writable: false, enumerable: true },
		toJSON: { writable: false, enumerable: false },
	});

	return augmented;
};

// ---------------------------------------------------------------------------
// Base type guard
// ---------------------------------------------------------------------------

/**
 * Type guard that checks whether a value is a `SnippetsError`.
 * Duck-types on the structured fields rather than using `instanceof`.
 */
export const isSnippetsError = (value: unknown): value is SnippetsError =>
	value instanceof Error &&
	'code' in value &&
	typeof value.code === 'string' &&
	'exitCode' in value &&
	typeof value.exitCode === 'number' &&
	'toJSON' in value &&
	typeof value.toJSON === 'function';

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

/**
 * Normalise an unknown thrown value into a proper `Error` instance.
 */
export const toError = (value: unknown): Error => {
	if (value instanceof Error) return value;
	if (typeof value === 'string') return new Error(value);
	return new Error(String(value));
};

/** Message of an unknown thrown value. */
export const errorMessage = (value: unknown): string => toError(value).message;

/**
 * Wrap an unknown cause in a `SnippetsError` with an optional error code.
 * The original value is attached as `cause` for chaining.
 */
export const wrapError = (
	message: string,
	cause: unknown,
	code?: string,
): SnippetsError => createSnippetsError(message, { cause, code });
