// ---------------------------------------------------------------------------
// RFC 3339 timestamps — the persisted form of `Snippet.createdAt`
// ---------------------------------------------------------------------------

import { z } from 'zod';

const rfc3339 = z.string().datetime({ offset: true });

/**
 * Format an instant as RFC 3339 in UTC with millisecond precision,
 * e.g. `2024-05-01T09:30:00.000Z`. `parseTimestamp` reverses it exactly.
 */
export const formatTimestamp = (date: Date): string => date.toISOString();

/**
 * Parse an RFC 3339 timestamp with a `Z` or numeric offset. Returns
 * `undefined` for anything else, including calendar-invalid dates.
 */
export const parseTimestamp = (value: string): Date | undefined => {
	if (!rfc3339.safeParse(value).success) return undefined;
	const date = new Date(value);
	return Number.isNaN(date.getTime()) ? undefined : date;
};
