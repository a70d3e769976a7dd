/**
 * Split text into lines the way a line reader sees them: a final newline does not
 * start an extra empty line, and a trailing carriage return is dropped from each line.
 */
export function splitLines(text: string): string[] {
	if (text === "") return [];
	const lines = text.split("\n");
	if (text.endsWith("\n")) lines.pop();
	return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

/** Position-tracked iterator over an indexed line sequence. */
export class LineCursor {
	private index = 0;

	constructor(private readonly lines: readonly string[]) {}

	/** Consume and return the next line, or undefined at end of input. */
	next(): string | undefined {
		const line = this.lines[this.index];
		if (line !== undefined) this.index++;
		return line;
	}

	peek(): string | undefined {
		return this.lines[this.index];
	}

	done(): boolean {
		return this.index >= this.lines.length;
	}

	/** One-based number of the line most recently returned by next(). */
	get lineNumber(): number {
		return this.index;
	}
}
