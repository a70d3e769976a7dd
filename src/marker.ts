import type { LineCursor } from "./cursor.js";
import { err, ok } from "./errors.js";
import type { Result } from "./errors.js";
import { REGION_ID } from "./region.js";
import type { ParsedMarkerBlock, SnippetLocator } from "./types.js";

export const MARKER_PREFIX = "<!-- snips:";

const MARKER_RE = new RegExp(
	`^(\\s*)<!--\\s*snips:\\s*([^#\\s]+)(?:#(${REGION_ID}))?\\s*-->\\s*$`,
);
const FENCE_RE = /^`+/;

export function isMarkerLine(line: string): boolean {
	return line.trimStart().startsWith(MARKER_PREFIX);
}

/** `path` or `path#name`, as written after `snips:`. */
export function describeLocator(locator: SnippetLocator): string {
	return locator.name === undefined ? locator.path : `${locator.path}#${locator.name}`;
}

export function formatMarker(locator: SnippetLocator, indent = ""): string {
	return `${indent}<!-- snips: ${describeLocator(locator)} -->`;
}

/**
 * Parse the marker line just returned by `cursor.next()` and consume its fenced block.
 * The block ends at the first line that trims to the opening run of backticks;
 * when no such line exists every remaining line belongs to the block.
 */
export function parseMarkerBlock(
	cursor: LineCursor,
	markerLine: string,
	file: string,
): Result<ParsedMarkerBlock> {
	const line = cursor.lineNumber;
	const match = MARKER_RE.exec(markerLine);
	const path = match?.[2];
	if (!match || path === undefined) {
		return err({ kind: "InvalidMarker", file, line, content: markerLine });
	}
	const indent = match[1] ?? "";
	const name = match[3];

	const fence = cursor.next();
	const ticks = fence === undefined ? undefined : FENCE_RE.exec(fence.trimStart())?.[0];
	if (fence === undefined || ticks === undefined) {
		return err({ kind: "MissingCodeFence", file, line });
	}

	const raw = [markerLine, fence];
	const body: string[] = [];
	for (let inner = cursor.next(); inner !== undefined; inner = cursor.next()) {
		raw.push(inner);
		if (inner.trim() === ticks) break;
		body.push(inner);
	}

	return ok({
		indent,
		locator: name === undefined ? { path } : { path, name },
		oldContent: body.join("\n"),
		line,
		raw,
	});
}
