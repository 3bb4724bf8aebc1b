// ---------------------------------------------------------------------------
// SnippetStorage — pluggable persistence for the snippet collection
// ---------------------------------------------------------------------------
//
// Every backend loads and saves the whole collection. Backends are frozen
// records of functions built by factories, discriminated by `kind`.
// ---------------------------------------------------------------------------

import type { Snippet, SnippetCollection } from '../snippets/types.js';

export type StorageKind = 'JSON' | 'SQLITE';

export const STORAGE_KINDS: readonly StorageKind[] = Object.freeze([
	'JSON',
	'SQLITE',
]);

export interface SnippetStorage {
	readonly kind: StorageKind;
	/** Backend-specific location: the file path for both built-in kinds. */
	readonly location: string;
	/**
	 * Load the full collection. A store that was never written yields an
	 * empty collection; a corrupt one throws a StorageReadError.
	 */
	readonly load: () => Promise<SnippetCollection>;
	/**
	 * Replace everything stored with `collection`. Throws a
	 * StorageWriteError when the medium cannot be written.
	 */
	readonly save: (collection: ReadonlyMap<string, Snippet>) => Promise<void>;
	/** Release held resources. Safe to call more than once. */
	readonly close: () => Promise<void>;
}
