// ---------------------------------------------------------------------------
// Command dispatcher — create / read / delete against the loaded collection
// ---------------------------------------------------------------------------

import { Buffer } from 'node:buffer';
import type { Logger } from '../logger.js';
import { formatTimestamp } from '../snippets/timestamp.js';
import { createSnippet, type SnippetCollection } from '../snippets/types.js';
import type { SnippetStorage } from '../storage/types.js';
import type { CLICommand } from './args.js';
import { MESSAGES, renderCreatedAt, USAGE_TEXT } from './ui.js';

export type CommandOutcome =
	| 'usage'
	| 'saved'
	| 'found'
	| 'deleted'
	| 'not-found';

export interface CommandContext {
	readonly storage: SnippetStorage;
	/** Loaded once at startup; mutated in place by create and delete. */
	readonly collection: SnippetCollection;
	/** Content for `create` without a URL, normally all of stdin. */
	readonly readContent: () => Promise<string>;
	readonly download: (url: string) => Promise<string>;
	readonly now: () => Date;
	/** Write one line to standard output. */
	readonly print: (line: string) => void;
	readonly logger: Logger;
}

/**
 * Execute one parsed command. `save` is called only when the collection
 * changed. Every failure propagates to the caller.
 */
export async function runCommand(
	command: CLICommand,
	ctx: CommandContext,
): Promise<CommandOutcome> {
	switch (command.type) {
		case 'usage':
			ctx.print(USAGE_TEXT);
			return 'usage';

		case 'create': {
			let content: string;
			if (command.url !== undefined) {
				ctx.logger.info(`Downloading snippet from ${command.url}`);
				content = await ctx.download(command.url);
			} else {
				content = await ctx.readContent();
			}

			ctx.collection.set(command.name, createSnippet(content, ctx.now()));
			await ctx.storage.save(ctx.collection);
			ctx.logger.info('Snippet saved', {
				name: command.name,
				bytes: Buffer.byteLength(content, 'utf-8'),
			});
			ctx.print(MESSAGES.saved);
			return 'saved';
		}

		case 'read': {
			const snippet = ctx.collection.get(command.name);
			if (!snippet) {
				ctx.logger.info('Snippet not found', { name: command.name });
				ctx.print(MESSAGES.notFound);
				return 'not-found';
			}
			ctx.print(renderCreatedAt(formatTimestamp(snippet.createdAt)));
			ctx.print(snippet.content);
			return 'found';
		}

		case 'delete': {
			if (!ctx.collection.delete(command.name)) {
				ctx.logger.info('Snippet not found', { name: command.name });
				ctx.print(MESSAGES.notFound);
				return 'not-found';
			}
			await ctx.storage.save(ctx.collection);
			ctx.logger.info('Snippet deleted', { name: command.name });
			ctx.print(MESSAGES.deleted);
			return 'deleted';
		}
	}
}
