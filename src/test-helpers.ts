import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

export interface Captured {
	stdout: string;
	stderr: string;
	error?: unknown;
}

/** Run a command with console output captured; a thrown error is returned, not rethrown. */
export async function captureOutput(fn: () => Promise<void>): Promise<Captured> {
	const origLog = console.log;
	const origError = console.error;
	let stdout = "";
	let stderr = "";
	console.log = (...args: unknown[]) => {
		stdout += `${args.join(" ")}\n`;
	};
	console.error = (...args: unknown[]) => {
		stderr += `${args.join(" ")}\n`;
	};
	try {
		await fn();
		return { stdout, stderr };
	} catch (error: unknown) {
		return { stdout, stderr, error };
	} finally {
		console.log = origLog;
		console.error = origError;
	}
}

export function makeTempDir(): string {
	return mkdtempSync(join(tmpdir(), "snips-test-"));
}

export function removeTempDir(dir: string): void {
	rmSync(dir, { recursive: true, force: true });
}

export function writeText(path: string, text: string): void {
	mkdirSync(dirname(path), { recursive: true });
	writeFileSync(path, text);
}

/** A document whose only block is stale against a `code.rs` holding `fn main(){}`. */
export function makeExample(dir: string): string {
	writeText(join(dir, "code.rs"), "fn main(){}\n");
	const doc = join(dir, "README.md");
	writeText(doc, "<!-- snips: code.rs -->\n```\nold\n```\n");
	return doc;
}
