/**
 * Timestamp helpers for the batch reader and the alerts query.
 *
 * Stored timestamps use the canonical form `YYYY-MM-DD HH:MM:SS` (wall-clock
 * time as written in the batch; any offset in the source cell is dropped).
 */

const CELL_PATTERN =
	/^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{1,2})(?::(\d{1,2})(?:\.\d+)?)?)?\s*(?:Z|[+-]\d{2}:?\d{2})?$/;

const STORED_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/;

interface DateTimeParts {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, '0');
}

function daysInMonth(year: number, month: number): number {
	return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toParts(groups: Array<string | undefined>): DateTimeParts | null {
	const [year, month, day, hour = '0', minute = '0', second = '0'] = groups;
	if (year === undefined || month === undefined || day === undefined) return null;

	const parts: DateTimeParts = {
		year: Number(year),
		month: Number(month),
		day: Number(day),
		hour: Number(hour),
		minute: Number(minute),
		second: Number(second),
	};

	if (parts.year < 1 || parts.month < 1 || parts.month > 12) return null;
	if (parts.day < 1 || parts.day > daysInMonth(parts.year, parts.month)) return null;
	if (parts.hour > 23 || parts.minute > 59 || parts.second > 59) return null;
	return parts;
}

function formatCanonical(parts: DateTimeParts): string {
	return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)} ${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`;
}

/**
 * Parse a batch `timestamp` cell into the canonical stored form.
 * Returns null when the cell is not a recognisable date or date-time.
 */
export function canonicalizeTimestamp(raw: string): string | null {
	const match = CELL_PATTERN.exec(raw.trim());
	if (!match) return null;
	const parts = toParts(match.slice(1, 7));
	return parts ? formatCanonical(parts) : null;
}

/**
 * Convert a stored canonical timestamp to ISO-8601 with a trailing UTC marker,
 * e.g. `2024-03-01 08:30:00` → `2024-03-01T08:30:00Z`. Null when unparseable.
 */
export function storedTimestampToIso(stored: string | undefined): string | null {
	if (stored === undefined) return null;
	const match = STORED_PATTERN.exec(stored);
	if (!match) return null;
	const parts = toParts(match.slice(1, 7));
	if (!parts) return null;
	return `${pad(parts.year, 4)}-${pad(parts.month)}-${pad(parts.day)}T${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}Z`;
}
