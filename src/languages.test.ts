import { describe, expect, it } from "vitest";
import { languageFor } from "./languages.js";

describe("languageFor", () => {
	it("maps extensions case-insensitively", () => {
		expect(languageFor("src/main.rs")).toBe("rust");
		expect(languageFor("lib/A.TS")).toBe("typescript");
		expect(languageFor("script.py")).toBe("python");
	});

	it("looks up extensionless files by name", () => {
		expect(languageFor("docker/Dockerfile")).toBe("dockerfile");
	});

	it("returns undefined for unknown extensions", () => {
		expect(languageFor("notes.unknownext")).toBeUndefined();
	});

	it("prefers overrides over the built-in table", () => {
		expect(languageFor("a.rs", { rs: "rs" })).toBe("rs");
		expect(languageFor("a.foo", { foo: "foolang" })).toBe("foolang");
	});
});
