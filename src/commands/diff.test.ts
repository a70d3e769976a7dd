import { realpathSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { captureOutput, makeExample, makeTempDir, removeTempDir, writeText } from "../test-helpers.js";
import { ExitError } from "../types.js";
import diff from "./diff.js";
import render from "./render.js";

let tmpDir: string;
let origCwd: string;

beforeEach(() => {
	tmpDir = realpathSync(makeTempDir());
	origCwd = process.cwd();
	process.chdir(tmpDir);
});

afterEach(() => {
	process.chdir(origCwd);
	removeTempDir(tmpDir);
});

describe("snips diff", () => {
	it("shows embedded against current content", async () => {
		makeExample(tmpDir);
		const { stdout, error } = await captureOutput(() => diff([], false));
		expect(error).toBeUndefined();
		expect(stdout).toBe("--- code.rs\n+++ code.rs\n-old\n+fn main(){}\n\n");
	});

	it("labels named regions and keeps context lines", async () => {
		writeText(
			join(tmpDir, "lib.rs"),
			"// snips-start: greet\nfn greet() {\n    hello();\n}\n// snips-end\n",
		);
		writeText(
			join(tmpDir, "GUIDE.md"),
			"<!-- snips: lib.rs#greet -->\n```rust\nfn greet() {\n    hi();\n}\n```\n",
		);
		const { stdout } = await captureOutput(() => diff(["GUIDE.md"], false));
		expect(stdout).toBe(
			"--- lib.rs#greet\n+++ lib.rs#greet\n fn greet() {\n-    hi();\n+    hello();\n }\n\n",
		);
	});

	it("prints nothing once the document is rendered", async () => {
		makeExample(tmpDir);
		await captureOutput(() => render([], false));
		const { stdout } = await captureOutput(() => diff([], false));
		expect(stdout).toBe("");
	});

	it("fails on a broken document but still diffs the others", async () => {
		makeExample(tmpDir);
		writeText(join(tmpDir, "bad.md"), "<!-- snips: code.rs -->\nno fence\n");
		const { stdout, stderr, error } = await captureOutput(() => diff([], false));
		expect(error).toBeInstanceOf(ExitError);
		expect(stderr).toBe(`Error: marker not followed by code fence: ${join(tmpDir, "bad.md")}:1\n`);
		expect(stdout).toContain("+fn main(){}");
	});

	it("reports diffs as JSON", async () => {
		makeExample(tmpDir);
		const { stdout } = await captureOutput(() => diff(["--json"], true));
		expect(JSON.parse(stdout)).toEqual({
			success: true,
			command: "diff",
			documents: [
				{
					path: "README.md",
					diffs: [{ path: "code.rs", oldContent: "old", newContent: "fn main(){}" }],
				},
			],
		});
	});
});
