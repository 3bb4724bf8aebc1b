// ---------------------------------------------------------------------------
// Configuration validation
// ---------------------------------------------------------------------------
//
// Environment values arrive as optional strings. Each validator returns a
// (possibly empty) frozen list of issues; callers combine them and throw a
// single ConfigurationError carrying every issue.
// ---------------------------------------------------------------------------

import type { ConfigIssue } from '../errors/index.js';
import { isLogLevel, LOG_LEVELS } from '../logger.js';

export type ValidationIssue = ConfigIssue;

const issue = (path: string, message: string): readonly ValidationIssue[] =>
	Object.freeze([Object.freeze({ path, message })]);

const ok: readonly ValidationIssue[] = Object.freeze([]);

export const combine = (
	...results: ReadonlyArray<readonly ValidationIssue[]>
): readonly ValidationIssue[] => Object.freeze(results.flat());

// ---------------------------------------------------------------------------
// Reusable validators
// ---------------------------------------------------------------------------

export const validateNonEmpty = (
	value: string | undefined,
	path: string,
	label: string,
): readonly ValidationIssue[] => {
	if (value !== undefined && value.trim().length === 0)
		return issue(path, `${label} cannot be empty`);
	return ok;
};

export const validateLogLevel = (
	value: string | undefined,
	path: string,
): readonly ValidationIssue[] => {
	if (value === undefined || isLogLevel(value)) return ok;
	return issue(
		path,
		`Log level '${value}' must be one of ${LOG_LEVELS.join(', ')}`,
	);
};

const TRUE_VALUES: readonly string[] = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES: readonly string[] = ['0', 'false', 'no', 'off', ''];

/** Interpret a boolean flag value; `undefined` when it is not one. */
export const parseBooleanFlag = (value: string): boolean | undefined => {
	const normalised = value.trim().toLowerCase();
	if (TRUE_VALUES.includes(normalised)) return true;
	if (FALSE_VALUES.includes(normalised)) return false;
	return undefined;
};

export const validateBooleanFlag = (
	value: string | undefined,
	path: string,
): readonly ValidationIssue[] => {
	if (value === undefined || parseBooleanFlag(value) !== undefined) return ok;
	return issue(path, `'${value}' is not a boolean (use true/false or 1/0)`);
};
