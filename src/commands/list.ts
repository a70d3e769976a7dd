import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { formatError } from "../errors.js";
import {
	displayPath,
	failures,
	listFileMarkers,
	processDocuments,
	resolveTargets,
} from "../files.js";
import { describeLocator } from "../marker.js";
import { c, errorOut, humanOut, jsonOut } from "../output.js";
import { ExitError } from "../types.js";

export default async function list(args: string[], json: boolean): Promise<void> {
	const cwd = process.cwd();

	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: snips list [files...] [options]

Options:
  --json    Output as JSON`);
		return;
	}

	const files = args.filter((a) => !a.startsWith("--"));
	const { config } = await loadConfig(cwd);
	const targets = resolveTargets(files, cwd, config.extensions);
	if (!targets.ok) {
		const error = formatError(targets.error);
		if (json) {
			jsonOut({ success: false, command: "list", error });
		} else {
			errorOut(`Error: ${error}`);
		}
		throw new ExitError(1);
	}

	const documents = processDocuments(targets.value, (path) => listFileMarkers(path));
	const failed = failures(documents).length > 0;

	if (json) {
		jsonOut({
			success: !failed,
			command: "list",
			documents: documents.map(({ path, result }) =>
				result.ok
					? {
							path: displayPath(path, cwd),
							markers: result.value.map((m) => ({ line: m.line, ...m.locator })),
						}
					: { path: displayPath(path, cwd), error: formatError(result.error) },
			),
		});
	} else {
		let total = 0;
		for (const { path, result } of documents) {
			if (!result.ok) {
				errorOut(`Error: ${formatError(result.error)}`);
				continue;
			}
			humanOut(c.file(displayPath(path, cwd)));
			for (const marker of result.value) {
				humanOut(`  ${c.dim(`${marker.line}:`)} ${describeLocator(marker.locator)}`);
			}
			total += result.value.length;
		}
		humanOut(c.dim(`\n${total} marker${total === 1 ? "" : "s"}`));
	}

	if (failed) {
		throw new ExitError(1);
	}
}

export function register(program: Command): void {
	program
		.command("list")
		.description("List the markers in each document")
		.argument("[files...]", "Documents to scan (default: documents in the current directory)")
		.option("--json", "Output as JSON")
		.action(async (files: string[], options: { json?: boolean }) => {
			const args = [...files, ...(options.json ? ["--json"] : [])];
			await list(args, options.json ?? false);
		});
}
