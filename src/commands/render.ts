import type { Command } from "commander";
import { loadConfig } from "../config.js";
import { formatError } from "../errors.js";
import {
	checkFiles,
	displayPath,
	processDocuments,
	renderFile,
	resolveTargets,
} from "../files.js";
import { describeLocator } from "../marker.js";
import { c, errorOut, humanOut, jsonOut, verboseOut } from "../output.js";
import type { RenderOutcome } from "../types.js";
import { ExitError } from "../types.js";
import diffCmd from "./diff.js";

function printOutcome(label: string, outcome: RenderOutcome, check: boolean): void {
	humanOut(c.file(label));
	if (outcome.snippets.length === 0) {
		humanOut(`  ${c.yellow("(no snippets found)")}`);
		return;
	}
	for (const { locator, updated } of outcome.snippets) {
		const marker = describeLocator(locator);
		let display = c.dim(marker);
		if (updated) {
			display = check ? `${c.red(marker)} [out of sync]` : `${c.green(marker)} [updated]`;
		}
		humanOut(`  ${c.cyan("↳")} ${display}`);
	}
}

export default async function render(args: string[], json: boolean): Promise<void> {
	const cwd = process.cwd();
	const command = args.includes("--check") ? "check" : "render";

	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: snips [render] [files...] [options]

Options:
  --check    Don't write; exit 1 when any document is out of sync
  --diff     Show what would change instead of writing
  --json     Output as JSON`);
		return;
	}

	if (args.includes("--diff")) {
		await diffCmd(
			args.filter((a) => a !== "--diff"),
			json,
		);
		return;
	}

	const check = command === "check";
	const files = args.filter((a) => !a.startsWith("--"));
	const { config, warnings } = await loadConfig(cwd);
	for (const warning of warnings) verboseOut(`config: ${warning}`);

	const targets = resolveTargets(files, cwd, config.extensions);
	if (!targets.ok) {
		const error = formatError(targets.error);
		if (json) {
			jsonOut({ success: false, command, error });
		} else {
			errorOut(`Error: ${error}`);
		}
		throw new ExitError(1);
	}

	const options = { languages: config.languages };
	verboseOut(`${command}: ${targets.value.length} document(s)`);
	const documents = check
		? checkFiles(targets.value, options).documents
		: processDocuments(targets.value, (path) => renderFile(path, true, options));

	let failed = false;
	let stale = false;
	for (const { path, result } of documents) {
		if (!result.ok) {
			failed = true;
			if (!json) errorOut(`Error: ${formatError(result.error)}`);
			continue;
		}
		stale = stale || result.value.updated;
		if (!json) printOutcome(displayPath(path, cwd), result.value, check);
	}

	if (json) {
		jsonOut({
			success: !failed && !(check && stale),
			command,
			documents: documents.map(({ path, result }) =>
				result.ok
					? {
							path: displayPath(path, cwd),
							updated: result.value.updated,
							snippets: result.value.snippets.map((s) => ({
								marker: describeLocator(s.locator),
								updated: s.updated,
							})),
						}
					: { path: displayPath(path, cwd), error: formatError(result.error) },
			),
		});
	}

	if (failed || (check && stale)) {
		throw new ExitError(1);
	}
}

export function register(program: Command): void {
	program
		.command("render", { isDefault: true })
		.description("Write current source content into every marker block")
		.argument("[files...]", "Documents to process (default: documents in the current directory)")
		.option("--check", "Don't write; exit 1 when any document is out of sync")
		.option("--diff", "Show what would change instead of writing")
		.option("--json", "Output as JSON")
		.action(
			async (files: string[], options: { check?: boolean; diff?: boolean; json?: boolean }) => {
				const args = [...files];
				if (options.check) args.push("--check");
				if (options.diff) args.push("--diff");
				if (options.json) args.push("--json");
				await render(args, options.json ?? false);
			},
		);

	program
		.command("check")
		.description("Exit 1 when any marker block is out of sync; writes nothing")
		.argument("[files...]", "Documents to check (default: documents in the current directory)")
		.option("--json", "Output as JSON")
		.action(async (files: string[], options: { json?: boolean }) => {
			const args = [...files, "--check"];
			if (options.json) args.push("--json");
			await render(args, options.json ?? false);
		});
}
