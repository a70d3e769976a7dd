import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { formatError } from "../errors.js";
import { diffFile, displayPath, processDocuments, resolveTargets } from "../files.js";
import { c, errorOut, humanOut, jsonOut, verboseOut } from "../output.js";
import { ExitError } from "../types.js";
import { formatSnippetDiff } from "../unified.js";

function colorize(line: string): string {
	if (line.startsWith("+++") || line.startsWith("---")) return c.bold(line);
	if (line.startsWith("+")) return c.green(line);
	if (line.startsWith("-")) return c.red(line);
	return line;
}

export default async function diff(args: string[], json: boolean): Promise<void> {
	const cwd = process.cwd();

	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: snips diff [files...] [options]

Options:
  --json    Output as JSON`);
		return;
	}

	const files = args.filter((a) => !a.startsWith("--"));
	const { config, warnings } = await loadConfig(cwd);
	for (const warning of warnings) verboseOut(`config: ${warning}`);

	const targets = resolveTargets(files, cwd, config.extensions);
	if (!targets.ok) {
		const error = formatError(targets.error);
		if (json) {
			jsonOut({ success: false, command: "diff", error });
		} else {
			errorOut(`Error: ${error}`);
		}
		throw new ExitError(1);
	}

	const documents = processDocuments(targets.value, (path) =>
		diffFile(path, { languages: config.languages }),
	);

	let failed = false;
	for (const { result } of documents) {
		if (!result.ok) {
			failed = true;
			if (!json) errorOut(`Error: ${formatError(result.error)}`);
			continue;
		}
		if (json) continue;
		for (const entry of result.value) {
			for (const line of formatSnippetDiff(entry)) humanOut(colorize(line));
			humanOut("");
		}
	}

	if (json) {
		jsonOut({
			success: !failed,
			command: "diff",
			documents: documents.map(({ path, result }) =>
				result.ok
					? { path: displayPath(path, cwd), diffs: result.value }
					: { path: displayPath(path, cwd), error: formatError(result.error) },
			),
		});
	}

	if (failed) {
		throw new ExitError(1);
	}
}

export function register(program: Command): void {
	program
		.command("diff")
		.description("Show embedded vs. current content for every stale marker")
		.argument("[files...]", "Documents to compare (default: documents in the current directory)")
		.option("--json", "Output as JSON")
		.action(async (files: string[], options: { json?: boolean }) => {
			const args = [...files, ...(options.json ? ["--json"] : [])];
			await diff(args, options.json ?? false);
		});
}
