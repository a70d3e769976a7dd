import { readFileSync, writeFileSync } from "node:fs";
import { err, fromFsError, ok } from "./errors.js";
import type { Result } from "./errors.js";

/** Whole-file text access used by the renderer for documents and sources alike. */
export interface FileAccess {
	read(path: string): Result<string>;
	write(path: string, text: string): Result<void>;
}

export const nodeFiles: FileAccess = {
	read(path) {
		try {
			return ok(readFileSync(path, "utf8"));
		} catch (cause: unknown) {
			return err(fromFsError(path, cause));
		}
	},
	write(path, text) {
		try {
			writeFileSync(path, text);
			return ok(undefined);
		} catch (cause: unknown) {
			return err(fromFsError(path, cause));
		}
	},
};
