// ---------------------------------------------------------------------------
// CLI argument parsing
// ---------------------------------------------------------------------------

import { createUsageError } from '../errors/index.js';

export type CLICommand =
	| { readonly type: 'create'; readonly name: string; readonly url?: string }
	| { readonly type: 'read'; readonly name: string }
	| { readonly type: 'delete'; readonly name: string }
	| { readonly type: 'usage' };

type ValueFlag = 'name' | 'download' | 'read' | 'delete';

const VALUE_FLAGS: readonly ValueFlag[] = ['name', 'download', 'read', 'delete'];

const isValueFlag = (value: string): value is ValueFlag =>
	VALUE_FLAGS.some((flag) => flag === value);

/**
 * Parse the arguments after the executable and script path.
 *
 * `--name`, `--read` and `--delete` are mutually exclusive; `--download` is
 * only valid with `--name`. No arguments, `--help` or `-h` yield `usage`.
 * Throws a UsageError on anything else.
 */
export function parseCLIArgs(args: readonly string[]): CLICommand {
	const values: Partial<Record<ValueFlag, string>> = {};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === '--help' || arg === '-h') {
			return { type: 'usage' };
		}
		if (!arg.startsWith('--')) {
			throw createUsageError(`Unexpected argument '${arg}'`);
		}

		const eq = arg.indexOf('=');
		const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
		if (!isValueFlag(flag)) {
			throw createUsageError(`Unknown option '--${flag}'`);
		}

		let value: string;
		if (eq !== -1) {
			value = arg.slice(eq + 1);
		} else {
			const next = args[i + 1];
			if (next === undefined || next.startsWith('--')) {
				throw createUsageError(`Option '--${flag}' requires a value`);
			}
			value = next;
			i++;
		}

		if (values[flag] !== undefined) {
			throw createUsageError(`Option '--${flag}' given more than once`);
		}
		values[flag] = value;
	}

	const intents = (['name', 'read', 'delete'] as const).filter(
		(flag) => values[flag] !== undefined,
	);
	if (intents.length > 1) {
		throw createUsageError(
			`Options ${intents.map((flag) => `--${flag}`).join(', ')} cannot be combined`,
		);
	}
	if (values.download !== undefined && values.name === undefined) {
		throw createUsageError("Option '--download' requires '--name'");
	}

	if (values.name !== undefined) {
		return values.download !== undefined
			? { type: 'create', name: values.name, url: values.download }
			: { type: 'create', name: values.name };
	}
	if (values.read !== undefined) return { type: 'read', name: values.read };
	if (values.delete !== undefined) {
		return { type: 'delete', name: values.delete };
	}
	return { type: 'usage' };
}
