import { isAbsolute, join } from "node:path";
import { LineCursor, splitLines } from "./cursor.js";
import { ok } from "./errors.js";
import type { Result } from "./errors.js";
import type { FileAccess } from "./fs.js";
import { nodeFiles } from "./fs.js";
import { languageFor } from "./languages.js";
import { formatMarker, isMarkerLine, parseMarkerBlock } from "./marker.js";
import { extractRegion } from "./region.js";
import type {
	MarkerListing,
	ParsedMarkerBlock,
	RenderOutcome,
	SnippetDiffEntry,
	SnippetLocator,
	SnippetReport,
} from "./types.js";

export interface ProcessOptions {
	files?: FileAccess;
	/** Extension → fence language entries layered over the built-in table. */
	languages?: Record<string, string>;
}

export interface ResolvedSnippet {
	content: string;
	language?: string;
}

type Segment =
	| { kind: "text"; line: string }
	| {
			kind: "block";
			block: ParsedMarkerBlock;
			/** Fresh content with the marker's indent applied. */
			body: string;
			language?: string;
			stale: boolean;
	  };

export function resolveSourcePath(baseDir: string, path: string): string {
	return isAbsolute(path) ? path : join(baseDir, path);
}

/** Read a marker's source and extract its region. Paths resolve against `baseDir`. */
export function resolveSnippet(
	baseDir: string,
	locator: SnippetLocator,
	options: ProcessOptions = {},
): Result<ResolvedSnippet> {
	const target = resolveSourcePath(baseDir, locator.path);
	const source = (options.files ?? nodeFiles).read(target);
	if (!source.ok) return source;
	const content = extractRegion(source.value, locator.name, target);
	if (!content.ok) return content;
	return ok({ content: content.value, language: languageFor(target, options.languages) });
}

/** Prefix every non-blank line with `indent`; trailing newlines are dropped. */
export function applyIndentation(content: string, indent: string): string {
	const trimmed = content.replace(/\n+$/, "");
	if (indent === "") return trimmed;
	return trimmed
		.split("\n")
		.map((line) => (line.trim() === "" ? line : `${indent}${line}`))
		.join("\n");
}

/**
 * Whether embedded content differs from fresh content.
 * Leading and trailing whitespace of the whole block is insignificant.
 */
export function isStale(oldContent: string, newContent: string): boolean {
	return oldContent.trim() !== newContent.trim();
}

/** Backtick run long enough that no line of `body` can close it early. */
function fenceFor(body: string): string {
	let longest = 0;
	for (const run of body.matchAll(/^[ \t]*(`+)/gm)) {
		longest = Math.max(longest, run[1]?.length ?? 0);
	}
	return "`".repeat(Math.max(3, longest + 1));
}

function emitBlock(block: ParsedMarkerBlock, body: string, language?: string): string[] {
	const fence = fenceFor(body);
	return [
		formatMarker(block.locator, block.indent),
		`${block.indent}${fence}${language ?? ""}`,
		...(body === "" ? [] : body.split("\n")),
		`${block.indent}${fence}`,
	];
}

function scanDocument(
	text: string,
	baseDir: string,
	file: string,
	options: ProcessOptions,
): Result<Segment[]> {
	const segments: Segment[] = [];
	const cursor = new LineCursor(splitLines(text));
	for (let line = cursor.next(); line !== undefined; line = cursor.next()) {
		if (!isMarkerLine(line)) {
			segments.push({ kind: "text", line });
			continue;
		}
		const parsed = parseMarkerBlock(cursor, line, file);
		if (!parsed.ok) return parsed;
		const block = parsed.value;

		const snippet = resolveSnippet(baseDir, block.locator, options);
		if (!snippet.ok) return snippet;
		const body = applyIndentation(snippet.value.content, block.indent);
		segments.push({
			kind: "block",
			block,
			body,
			language: snippet.value.language,
			stale: isStale(block.oldContent, body),
		});
	}
	return ok(segments);
}

/**
 * Re-render every marker block of a document. Blocks already in sync are kept
 * byte-for-byte; stale blocks are re-emitted with a normalized marker and fences.
 * `renderedText` is present only when at least one block was stale.
 */
export function renderContent(
	text: string,
	baseDir: string,
	file: string,
	options: ProcessOptions = {},
): Result<RenderOutcome> {
	const scanned = scanDocument(text, baseDir, file, options);
	if (!scanned.ok) return scanned;

	const out: string[] = [];
	const snippets: SnippetReport[] = [];
	for (const segment of scanned.value) {
		if (segment.kind === "text") {
			out.push(segment.line);
			continue;
		}
		snippets.push({ locator: segment.block.locator, updated: segment.stale });
		if (segment.stale) {
			out.push(...emitBlock(segment.block, segment.body, segment.language));
		} else {
			out.push(...segment.block.raw);
		}
	}

	if (!snippets.some((s) => s.updated)) {
		return ok({ updated: false, snippets });
	}
	const renderedText = out.join("\n") + (text.endsWith("\n") ? "\n" : "");
	return ok({ updated: true, renderedText, snippets });
}

/** Stale markers of a document, old against fresh content. Never writes. */
export function diffContent(
	text: string,
	baseDir: string,
	file: string,
	options: ProcessOptions = {},
): Result<SnippetDiffEntry[]> {
	const scanned = scanDocument(text, baseDir, file, options);
	if (!scanned.ok) return scanned;

	const diffs: SnippetDiffEntry[] = [];
	for (const segment of scanned.value) {
		if (segment.kind !== "block" || !segment.stale) continue;
		const { locator, oldContent } = segment.block;
		diffs.push({ ...locator, oldContent, newContent: segment.body });
	}
	return ok(diffs);
}

/** Markers of a document with their line numbers. Sources are not read. */
export function listMarkers(text: string, file: string): Result<MarkerListing[]> {
	const markers: MarkerListing[] = [];
	const cursor = new LineCursor(splitLines(text));
	for (let line = cursor.next(); line !== undefined; line = cursor.next()) {
		if (!isMarkerLine(line)) continue;
		const parsed = parseMarkerBlock(cursor, line, file);
		if (!parsed.ok) return parsed;
		markers.push({ line: parsed.value.line, locator: parsed.value.locator });
	}
	return ok(markers);
}
