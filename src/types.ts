/** A marker's reference: a source path as written in the document, plus an optional region. */
export interface SnippetLocator {
	path: string;
	name?: string;
}

export interface ParsedMarkerBlock {
	indent: string;
	locator: SnippetLocator;
	oldContent: string;
	/** One-based line number of the marker line. */
	line: number;
	/** The block's physical lines, marker through closing fence, as found in the document. */
	raw: string[];
}

export interface SnippetReport {
	locator: SnippetLocator;
	updated: boolean;
}

export interface RenderOutcome {
	updated: boolean;
	renderedText?: string;
	snippets: SnippetReport[];
}

export interface SnippetDiffEntry {
	path: string;
	name?: string;
	oldContent: string;
	newContent: string;
}

export interface MarkerListing {
	line: number;
	locator: SnippetLocator;
}

export interface Config {
	extensions: string[];
	languages: Record<string, string>;
}

export const DEFAULT_EXTENSIONS = ["md", "markdown"];
export const CONFIG_FILE = ".snips.yaml";

/**
 * Thrown from command handlers instead of process.exit(1)
 * so the entry point owns the exit code.
 */
export class ExitError extends Error {
	constructor(public readonly exitCode: number = 1) {
		super("");
	}
}
