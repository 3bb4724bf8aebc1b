// ---------------------------------------------------------------------------
// Snippet content sources — standard input and URL download
// ---------------------------------------------------------------------------

import {
	createFetchError,
	createStdinReadError,
	errorMessage,
} from '../errors/index.js';

export type FetchFn = (url: string) => Promise<Response>;

/** Any byte or text stream, e.g. `process.stdin`. */
export type ContentStream = AsyncIterable<Uint8Array | string>;

/**
 * Read `stream` to its end and decode it as UTF-8.
 * Throws a StdinReadError when the stream fails or the bytes are not valid
 * UTF-8.
 */
export async function readStdin(stream: ContentStream): Promise<string> {
	const decoder = new TextDecoder('utf-8', { fatal: true });
	let text = '';
	try {
		for await (const chunk of stream) {
			text +=
				typeof chunk === 'string'
					? chunk
					: decoder.decode(chunk, { stream: true });
		}
		text += decoder.decode();
	} catch (error) {
		throw createStdinReadError({ cause: error });
	}
	return text;
}

export interface DownloadOptions {
	/** Defaults to the global `fetch`. */
	readonly fetch?: FetchFn;
}

/**
 * GET `url` and return the response body as text. No timeout and no retry:
 * a hanging server blocks the caller.
 *
 * Throws a FetchError for a non-http(s) URL, a network failure, a non-2xx
 * status, or a body that cannot be read.
 */
export async function downloadContent(
	url: string,
	options: DownloadOptions = {},
): Promise<string> {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch (error) {
		throw createFetchError(url, 'invalid URL', { cause: error });
	}
	if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
		throw createFetchError(url, `unsupported protocol '${parsed.protocol}'`);
	}

	const doFetch = options.fetch ?? fetch;

	let response: Response;
	try {
		response = await doFetch(parsed.href);
	} catch (error) {
		throw createFetchError(url, errorMessage(error), { cause: error });
	}

	if (!response.ok) {
		throw createFetchError(
			url,
			`HTTP ${response.status} ${response.statusText}`.trim(),
			{ status: response.status },
		);
	}

	try {
		return await response.text();
	} catch (error) {
		throw createFetchError(url, errorMessage(error), { cause: error });
	}
}
