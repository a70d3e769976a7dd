import { splitLines } from "./cursor.js";
import { err, ok } from "./errors.js";
import type { Result } from "./errors.js";

/** Characters allowed in a region name. */
export const REGION_ID = "[\\w-]+";

// A delimiter may sit inside a block comment, so its closing token is tolerated.
const COMMENT_CLOSE = "(?:\\*\\/|-->|\\*\\))?";
const START_RE = new RegExp(`snips-start:\\s*(${REGION_ID})\\s*${COMMENT_CLOSE}\\s*$`);
const END_RE = new RegExp(`snips-end(?::(?:\\s*(${REGION_ID}))?)?\\s*${COMMENT_CLOSE}\\s*$`);

function commonPrefix(a: string, b: string): string {
	let i = 0;
	while (i < a.length && i < b.length && a[i] === b[i]) i++;
	return a.slice(0, i);
}

/**
 * Remove the leading whitespace shared by every non-blank line.
 * Blank lines do not count towards the prefix and are returned untouched.
 */
export function dedent(text: string): string {
	const lines = text.split("\n");
	let shared: string | undefined;
	for (const line of lines) {
		if (line.trim() === "") continue;
		const lead = /^[ \t]*/.exec(line)?.[0] ?? "";
		shared = shared === undefined ? lead : commonPrefix(shared, lead);
		if (shared === "") return text;
	}
	if (!shared) return text;
	const prefix = shared;
	return lines.map((line) => (line.trim() === "" ? line : line.slice(prefix.length))).join("\n");
}

/** Names declared by start delimiters, in file order. */
export function listRegions(source: string): string[] {
	const names: string[] = [];
	for (const line of splitLines(source)) {
		const name = START_RE.exec(line)?.[1];
		if (name !== undefined) names.push(name);
	}
	return names;
}

/**
 * Extract a named region, or the whole source when `name` is undefined, dedented.
 * The first start delimiter carrying `name` opens the region; it is closed by the next
 * end delimiter that is either unnamed or names the same region.
 */
export function extractRegion(
	source: string,
	name: string | undefined,
	sourceId: string,
): Result<string> {
	if (name === undefined) {
		return ok(dedent(splitLines(source).join("\n")));
	}

	let open = false;
	const body: string[] = [];
	for (const line of splitLines(source)) {
		if (!open) {
			open = START_RE.exec(line)?.[1] === name;
			continue;
		}
		const end = END_RE.exec(line);
		if (end && (end[1] === undefined || end[1] === name)) {
			return ok(dedent(body.join("\n")));
		}
		body.push(line);
	}

	if (open) {
		return err({ kind: "UnterminatedRegion", file: sourceId, name });
	}
	return err({ kind: "RegionNotFound", file: sourceId, name, available: listRegions(source) });
}
