import { diffLines } from "diff";
import { describeLocator } from "./marker.js";
import type { SnippetDiffEntry } from "./types.js";

function withNewline(text: string): string {
	return text === "" || text.endsWith("\n") ? text : `${text}\n`;
}

/** Line diff of `oldText` against `newText`, each line prefixed with `-`, `+` or a space. */
export function diffTextLines(oldText: string, newText: string): string[] {
	const out: string[] = [];
	for (const part of diffLines(withNewline(oldText), withNewline(newText))) {
		const sign = part.added ? "+" : part.removed ? "-" : " ";
		const lines = part.value.split("\n");
		if (part.value.endsWith("\n")) lines.pop();
		for (const line of lines) out.push(`${sign}${line}`);
	}
	return out;
}

/** Header lines followed by the content diff for one stale marker. */
export function formatSnippetDiff(entry: SnippetDiffEntry): string[] {
	const label = describeLocator(entry);
	return [`--- ${label}`, `+++ ${label}`, ...diffTextLines(entry.oldContent, entry.newContent)];
}
