import { readdirSync, statSync } from "node:fs";
import { dirname, extname, isAbsolute, join, relative, resolve } from "node:path";
import { err, fromFsError, ok } from "./errors.js";
import type { Result, SnipsError } from "./errors.js";
import { nodeFiles } from "./fs.js";
import { diffContent, listMarkers, renderContent } from "./processor.js";
import type { ProcessOptions } from "./processor.js";
import type { MarkerListing, RenderOutcome, SnippetDiffEntry } from "./types.js";
import { DEFAULT_EXTENSIONS } from "./types.js";

export interface DocumentResult<T> {
	path: string;
	result: Result<T>;
}

function readDocument(path: string, options: ProcessOptions): Result<string> {
	return (options.files ?? nodeFiles).read(path);
}

/**
 * Render one document against the sources next to it.
 * With `write`, a document that changed is replaced whole.
 */
export function renderFile(
	path: string,
	write: boolean,
	options: ProcessOptions = {},
): Result<RenderOutcome> {
	const text = readDocument(path, options);
	if (!text.ok) return text;
	const outcome = renderContent(text.value, dirname(path), path, options);
	if (!outcome.ok) return outcome;
	if (write && outcome.value.renderedText !== undefined) {
		const written = (options.files ?? nodeFiles).write(path, outcome.value.renderedText);
		if (!written.ok) return written;
	}
	return outcome;
}

export function diffFile(path: string, options: ProcessOptions = {}): Result<SnippetDiffEntry[]> {
	const text = readDocument(path, options);
	if (!text.ok) return text;
	return diffContent(text.value, dirname(path), path, options);
}

export function listFileMarkers(path: string, options: ProcessOptions = {}): Result<MarkerListing[]> {
	const text = readDocument(path, options);
	if (!text.ok) return text;
	return listMarkers(text.value, path);
}

/**
 * Apply `operation` to each document in turn. A failing document does not stop
 * the ones after it.
 */
export function processDocuments<T>(
	paths: string[],
	operation: (path: string) => Result<T>,
): DocumentResult<T>[] {
	return paths.map((path) => ({ path, result: operation(path) }));
}

export interface CheckSummary {
	clean: boolean;
	documents: DocumentResult<RenderOutcome>[];
}

/** Render without writing. Clean means every document succeeded and none is stale. */
export function checkFiles(paths: string[], options: ProcessOptions = {}): CheckSummary {
	const documents = processDocuments(paths, (path) => renderFile(path, false, options));
	const clean = documents.every(({ result }) => result.ok && !result.value.updated);
	return { clean, documents };
}

export function failures<T>(documents: DocumentResult<T>[]): SnipsError[] {
	const errors: SnipsError[] = [];
	for (const { result } of documents) {
		if (!result.ok) errors.push(result.error);
	}
	return errors;
}

/** Regular files directly inside `dir` with one of `extensions`, sorted by name. */
export function discoverDocuments(
	dir: string,
	extensions: string[] = DEFAULT_EXTENSIONS,
): Result<string[]> {
	const wanted = new Set(extensions.map((e) => e.replace(/^\./, "").toLowerCase()));
	let entries: string[];
	try {
		entries = readdirSync(dir);
	} catch (cause: unknown) {
		return err(fromFsError(dir, cause));
	}
	const documents = entries
		.filter((name) => wanted.has(extname(name).slice(1).toLowerCase()))
		.map((name) => join(dir, name))
		.filter((path) => statSync(path, { throwIfNoEntry: false })?.isFile() ?? false)
		.sort();
	if (documents.length === 0) {
		return err({ kind: "NoDocuments", dir });
	}
	return ok(documents);
}

/** Explicit files resolve against `cwd`; with none, documents in `cwd` are discovered. */
export function resolveTargets(
	files: string[],
	cwd: string,
	extensions: string[] = DEFAULT_EXTENSIONS,
): Result<string[]> {
	if (files.length > 0) return ok(files.map((file) => resolve(cwd, file)));
	return discoverDocuments(cwd, extensions);
}

/** `path` relative to `cwd` when it lies inside it. */
export function displayPath(path: string, cwd: string): string {
	const rel = relative(cwd, path);
	return rel === "" || rel.startsWith("..") || isAbsolute(rel) ? path : rel;
}
