import { mkdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	checkFiles,
	diffFile,
	discoverDocuments,
	displayPath,
	failures,
	listFileMarkers,
	processDocuments,
	renderFile,
	resolveTargets,
} from "./files.js";
import { makeExample, makeTempDir, removeTempDir, writeText } from "./test-helpers.js";

let tmpDir: string;

beforeEach(() => {
	tmpDir = makeTempDir();
});

afterEach(() => {
	removeTempDir(tmpDir);
});

describe("renderFile", () => {
	it("writes the re-rendered document", () => {
		const doc = makeExample(tmpDir);
		const result = renderFile(doc, true);
		expect(result.ok && result.value.updated).toBe(true);
		expect(readFileSync(doc, "utf8")).toBe("<!-- snips: code.rs -->\n```rust\nfn main(){}\n```\n");
	});

	it("leaves the document alone without write", () => {
		const doc = makeExample(tmpDir);
		const result = renderFile(doc, false);
		expect(result.ok && result.value.renderedText).toBe(
			"<!-- snips: code.rs -->\n```rust\nfn main(){}\n```\n",
		);
		expect(readFileSync(doc, "utf8")).toBe("<!-- snips: code.rs -->\n```\nold\n```\n");
	});

	it("resolves sources against the document's own directory", () => {
		writeText(join(tmpDir, "src", "lib.rs"), "// snips-start: api\npub fn api() {}\n// snips-end\n");
		const doc = join(tmpDir, "docs", "guide.md");
		writeText(doc, "<!-- snips: ../src/lib.rs#api -->\n```\n```\n");
		const result = renderFile(doc, true);
		expect(result.ok).toBe(true);
		expect(readFileSync(doc, "utf8")).toBe(
			"<!-- snips: ../src/lib.rs#api -->\n```rust\npub fn api() {}\n```\n",
		);
	});

	it("reports a missing document", () => {
		const missing = join(tmpDir, "nope.md");
		expect(renderFile(missing, false)).toEqual({
			ok: false,
			error: { kind: "FileNotFound", path: missing },
		});
	});

	it("reports a missing source by its resolved path", () => {
		const doc = join(tmpDir, "README.md");
		writeText(doc, "<!-- snips: gone.rs -->\n```\n```\n");
		expect(renderFile(doc, true)).toEqual({
			ok: false,
			error: { kind: "FileNotFound", path: join(tmpDir, "gone.rs") },
		});
	});
});

describe("diffFile", () => {
	it("returns entries for stale markers only", () => {
		const doc = makeExample(tmpDir);
		expect(diffFile(doc)).toEqual({
			ok: true,
			value: [{ path: "code.rs", oldContent: "old", newContent: "fn main(){}" }],
		});
		renderFile(doc, true);
		expect(diffFile(doc)).toEqual({ ok: true, value: [] });
	});
});

describe("listFileMarkers", () => {
	it("lists markers without reading their sources", () => {
		const doc = join(tmpDir, "README.md");
		writeText(doc, "text\n<!-- snips: absent.rs#x -->\n```\n```\n");
		expect(listFileMarkers(doc)).toEqual({
			ok: true,
			value: [{ line: 2, locator: { path: "absent.rs", name: "x" } }],
		});
	});
});

describe("checkFiles", () => {
	it("is clean only once every document is in sync", () => {
		const doc = makeExample(tmpDir);
		expect(checkFiles([doc]).clean).toBe(false);
		expect(readFileSync(doc, "utf8")).toContain("old");
		renderFile(doc, true);
		expect(checkFiles([doc]).clean).toBe(true);
	});

	it("is not clean when a document fails", () => {
		expect(checkFiles([join(tmpDir, "nope.md")]).clean).toBe(false);
	});
});

describe("processDocuments", () => {
	it("keeps going after a failing document", () => {
		const good = makeExample(tmpDir);
		const bad = join(tmpDir, "bad.md");
		writeText(bad, "<!-- snips: gone.rs -->\n```\n```\n");

		const documents = processDocuments([bad, good], (path) => renderFile(path, true));
		expect(documents.map((d) => d.result.ok)).toEqual([false, true]);
		expect(failures(documents)).toEqual([{ kind: "FileNotFound", path: join(tmpDir, "gone.rs") }]);
		expect(readFileSync(good, "utf8")).toContain("fn main(){}");
	});
});

describe("discoverDocuments", () => {
	it("finds files with a configured extension, sorted", () => {
		writeText(join(tmpDir, "b.md"), "");
		writeText(join(tmpDir, "a.markdown"), "");
		writeText(join(tmpDir, "c.txt"), "");
		mkdirSync(join(tmpDir, "d.md"));
		expect(discoverDocuments(tmpDir)).toEqual({
			ok: true,
			value: [join(tmpDir, "a.markdown"), join(tmpDir, "b.md")],
		});
	});

	it("honours configured extensions", () => {
		writeText(join(tmpDir, "b.md"), "");
		writeText(join(tmpDir, "a.MDX"), "");
		expect(discoverDocuments(tmpDir, ["mdx"])).toEqual({ ok: true, value: [join(tmpDir, "a.MDX")] });
	});

	it("fails when nothing matches", () => {
		expect(discoverDocuments(tmpDir)).toEqual({
			ok: false,
			error: { kind: "NoDocuments", dir: tmpDir },
		});
	});
});

describe("resolveTargets", () => {
	it("resolves explicit files against cwd", () => {
		expect(resolveTargets(["docs/a.md"], tmpDir)).toEqual({
			ok: true,
			value: [join(tmpDir, "docs", "a.md")],
		});
	});

	it("discovers documents when no files are given", () => {
		makeExample(tmpDir);
		expect(resolveTargets([], tmpDir)).toEqual({ ok: true, value: [join(tmpDir, "README.md")] });
	});
});

describe("displayPath", () => {
	it("shows paths inside cwd relative to it", () => {
		expect(displayPath(join(tmpDir, "docs", "a.md"), tmpDir)).toBe(join("docs", "a.md"));
		expect(displayPath("/elsewhere/a.md", tmpDir)).toBe("/elsewhere/a.md");
	});
});
