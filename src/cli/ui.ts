/**
 * snippets-app — Terminal output
 *
 * Colours (via chalk), usage text and status line formatting.
 */

import { Chalk } from 'chalk';
import {
	ENV_ATOMIC_WRITE,
	ENV_LOG_LEVEL,
	ENV_LOG_PATH,
	ENV_STORAGE,
} from '../config/settings.js';

// ---------------------------------------------------------------------------
// Colors
// ---------------------------------------------------------------------------

export interface TermColors {
	readonly bold: (s: string) => string;
	readonly red: (s: string) => string;
}

export interface TermColorsOptions {
	readonly enabled: boolean;
}

export function createColors(options: TermColorsOptions): TermColors {
	const chalk = new Chalk({ level: options.enabled ? 1 : 0 });
	return Object.freeze({
		bold: (s: string) => chalk.bold(s),
		red: (s: string) => chalk.red(s),
	});
}

/** Colour only real terminals, and honour NO_COLOR. */
export function shouldUseColor(
	stream: { readonly isTTY?: boolean },
	env: Readonly<Record<string, string | undefined>>,
): boolean {
	return stream.isTTY === true && !env.NO_COLOR;
}

// ---------------------------------------------------------------------------
// Text
// ---------------------------------------------------------------------------

export const USAGE_TEXT = `Usage:
  --name <name> [--download URL]
  --read <name>
  --delete <name>

Content for --name is read from standard input unless --download is given.

Environment:
  ${ENV_STORAGE}       JSON:<path> or SQLITE:<path> (required)
  ${ENV_LOG_LEVEL}     debug|info|warn|error|none (default: info)
  ${ENV_LOG_PATH}      log file (default: snippets.log)
  ${ENV_ATOMIC_WRITE}  write JSON through a temporary file (default: false)`;

export const MESSAGES = Object.freeze({
	saved: 'Snippet saved.',
	deleted: 'Snippet deleted.',
	notFound: 'Snippet not found.',
});

export function renderCreatedAt(timestamp: string): string {
	return `Created at: ${timestamp}`;
}

export function renderError(message: string, colors: TermColors): string {
	return `${colors.red(colors.bold('Error:'))} ${message}`;
}
