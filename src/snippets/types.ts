// ---------------------------------------------------------------------------
// Snippet data model
// ---------------------------------------------------------------------------

/** A named, timestamped block of text. The name lives in the collection key. */
export interface Snippet {
	readonly content: string;
	readonly createdAt: Date;
}

/** The complete name → Snippet map; always loaded and saved as a whole. */
export type SnippetCollection = Map<string, Snippet>;

export const createSnippet = (content: string, createdAt: Date): Snippet =>
	Object.freeze({ content, createdAt });
