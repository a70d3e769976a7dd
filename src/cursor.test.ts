import { describe, expect, it } from "vitest";
import { LineCursor, splitLines } from "./cursor.js";

describe("splitLines", () => {
	it("does not produce an empty line for a final newline", () => {
		expect(splitLines("a\nb\n")).toEqual(["a", "b"]);
		expect(splitLines("a\n\n")).toEqual(["a", ""]);
	});

	it("drops carriage returns", () => {
		expect(splitLines("a\r\nb\r\n")).toEqual(["a", "b"]);
	});

	it("returns no lines for empty text", () => {
		expect(splitLines("")).toEqual([]);
		expect(splitLines("\n")).toEqual([""]);
	});
});

describe("LineCursor", () => {
	it("tracks one-based line numbers as it advances", () => {
		const cursor = new LineCursor(["a", "b"]);
		expect(cursor.lineNumber).toBe(0);
		expect(cursor.next()).toBe("a");
		expect(cursor.lineNumber).toBe(1);
		expect(cursor.peek()).toBe("b");
		expect(cursor.next()).toBe("b");
		expect(cursor.done()).toBe(true);
		expect(cursor.next()).toBeUndefined();
		expect(cursor.lineNumber).toBe(2);
	});
});
