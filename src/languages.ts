import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";

let builtin: Map<string, string> | undefined;

function builtinTable(): Map<string, string> {
	if (!builtin) {
		const parsed: unknown = JSON.parse(
			readFileSync(new URL("../data/languages.json", import.meta.url), "utf8"),
		);
		builtin = new Map();
		if (typeof parsed === "object" && parsed !== null) {
			for (const [ext, lang] of Object.entries(parsed)) {
				if (typeof lang === "string") builtin.set(ext, lang);
			}
		}
	}
	return builtin;
}

/**
 * Fence language for a source path, keyed by lower-cased extension.
 * Files without an extension (Dockerfile, Makefile) are looked up by name.
 */
export function languageFor(
	path: string,
	overrides: Record<string, string> = {},
): string | undefined {
	const key = (extname(path).slice(1) || basename(path)).toLowerCase();
	return overrides[key] ?? builtinTable().get(key);
}
