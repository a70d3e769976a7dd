import { resolve } from "node:path";
import type { Command } from "commander";
import { formatError } from "../errors.js";
import { nodeFiles } from "../fs.js";
import { c, errorOut, humanOut, jsonOut } from "../output.js";
import { listRegions } from "../region.js";
import { ExitError } from "../types.js";

export default async function regions(args: string[], json: boolean): Promise<void> {
	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: snips regions <source> [options]

Options:
  --json    Output as JSON`);
		return;
	}

	const source = args.filter((a) => !a.startsWith("--"))[0];
	if (!source) {
		if (json) {
			jsonOut({ success: false, command: "regions", error: "Source file required" });
		} else {
			errorOut("Usage: snips regions <source>");
		}
		throw new ExitError(1);
	}

	const text = nodeFiles.read(resolve(process.cwd(), source));
	if (!text.ok) {
		const error = formatError(text.error);
		if (json) {
			jsonOut({ success: false, command: "regions", error });
		} else {
			errorOut(`Error: ${error}`);
		}
		throw new ExitError(1);
	}

	const names = listRegions(text.value);
	if (json) {
		jsonOut({ success: true, command: "regions", source, regions: names });
		return;
	}
	if (names.length === 0) {
		humanOut(c.yellow(`No regions declared in ${source}`));
		return;
	}
	for (const name of names) {
		humanOut(`${source}#${name}`);
	}
}

export function register(program: Command): void {
	program
		.command("regions")
		.description("List the regions declared in a source file")
		.argument("<source>", "Source file to scan")
		.option("--json", "Output as JSON")
		.action(async (source: string, options: { json?: boolean }) => {
			const args = [source, ...(options.json ? ["--json"] : [])];
			await regions(args, options.json ?? false);
		});
}
