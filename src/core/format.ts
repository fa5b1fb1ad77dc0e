/**
 * Text formatting shared by announcements and replies.
 *
 * @module core/format
 */

/** IRC servers cut lines at 512 bytes; 400 leaves room for the prefix. */
export const MAX_LINE_LENGTH = 400;

/**
 * Seconds as `D day(s), HH:MM:SS`.
 *
 * @example
 * fmtTime(90061); // "1 day, 01:01:01"
 */
export function fmtTime(seconds: number): string {
	const total = Math.max(0, Math.floor(seconds));
	const days = Math.floor(total / 86400);
	const hours = Math.floor((total % 86400) / 3600);
	const minutes = Math.floor((total % 3600) / 60);
	const secs = total % 60;
	const pad = (n: number) => String(n).padStart(2, "0");
	return `${days} day${days === 1 ? "" : "s"}, ${pad(hours)}:${pad(minutes)}:${pad(secs)}`;
}

/**
 * Splits text into lines no longer than `limit`, preferring to break on
 * spaces. Words longer than the limit are cut.
 */
export function splitMessage(text: string, limit = MAX_LINE_LENGTH): string[] {
	const lines: string[] = [];
	let rest = text;
	while (rest.length > limit) {
		let cut = rest.lastIndexOf(" ", limit);
		if (cut <= 0) cut = limit;
		lines.push(rest.slice(0, cut));
		rest = rest.slice(cut).replace(/^ +/, "");
	}
	if (rest.length > 0 || lines.length === 0) lines.push(rest);
	return lines;
}

/** "a", "a and b", "a, b, and c" */
export function joinNames(names: readonly string[]): string {
	if (names.length <= 1) return names.join("");
	if (names.length === 2) return `${names[0]} and ${names[1]}`;
	return `${names.slice(0, -1).join(", ")}, and ${names[names.length - 1]}`;
}
