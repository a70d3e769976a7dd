#!/usr/bin/env node
import chalk from "chalk";
import { Command, Help } from "commander";
import { errorOut, isJsonMode, jsonOut, palette, setQuiet, setVerbose } from "./output.js";
import { ExitError } from "./types.js";

export const VERSION = "0.1.0";

const t0 = performance.now();

const rawArgs = process.argv.slice(2);

// --version --json: rich metadata output (before Commander processes version flag)
if ((rawArgs.includes("-v") || rawArgs.includes("--version")) && rawArgs.includes("--json")) {
	const platform = `${process.platform}-${process.arch}`;
	console.log(
		JSON.stringify({ name: "snips-sync", version: VERSION, runtime: "node", platform }),
	);
	process.exit();
}

// Apply output modes early (before Commander parses)
if (rawArgs.includes("--quiet") || rawArgs.includes("-q")) {
	setQuiet(true);
}
if (rawArgs.includes("--verbose")) {
	setVerbose(true);
}

const program = new Command();
program
	.name("snips")
	.description("Keep documentation code blocks in sync with source files")
	.version(VERSION, "-v, --version", "Show version")
	.option("-q, --quiet", "Suppress non-error output")
	.option("--verbose", "Extra diagnostic output")
	.option("--timing", "Show command execution time")
	.addHelpCommand(false)
	.configureHelp({
		formatHelp(cmd: Command, helper: Help): string {
			if (cmd.parent) {
				return Help.prototype.formatHelp.call(helper, cmd, helper);
			}
			const header = `${palette.brand(chalk.bold("snips"))} ${palette.muted(`v${VERSION}`)} — Keep documentation code blocks in sync\n\nUsage: snips [command] [files...] [options]`;

			const cmdLines: string[] = ["\nCommands:"];
			for (const sub of cmd.commands) {
				const name = sub.name();
				const argStr = sub.registeredArguments
					.map((a) => (a.required ? `<${a.name()}>` : `[${a.name()}]`))
					.join(" ");
				const rawEntry = argStr ? `${name} ${argStr}` : name;
				const colored = argStr ? `${chalk.green(name)} ${chalk.dim(argStr)}` : chalk.green(name);
				const pad = " ".repeat(Math.max(20 - rawEntry.length, 2));
				cmdLines.push(`  ${colored}${pad}${sub.description()}`);
			}

			const opts: [string, string][] = [
				["-h, --help", "Show help"],
				["-v, --version", "Show version"],
				["--json", "Output as JSON"],
				["-q, --quiet", "Suppress non-error output"],
				["--verbose", "Extra diagnostic output"],
				["--timing", "Show command execution time"],
			];
			const optLines: string[] = ["\nOptions:"];
			for (const [flag, desc] of opts) {
				const pad = " ".repeat(Math.max(20 - flag.length, 2));
				optLines.push(`  ${chalk.dim(flag)}${pad}${desc}`);
			}

			const footer = `\nRun '${chalk.dim("snips")} <command> --help' for command-specific help.`;

			return `${[header, ...cmdLines, ...optLines, footer].join("\n")}\n`;
		},
	});

const { register: registerRender } = await import("./commands/render.js");
const { register: registerDiff } = await import("./commands/diff.js");
const { register: registerList } = await import("./commands/list.js");
const { register: registerRegions } = await import("./commands/regions.js");
const { register: registerInit } = await import("./commands/init.js");

registerRender(program); // registers both render and check
registerDiff(program);
registerList(program);
registerRegions(program);
registerInit(program);

program
	.parseAsync(process.argv)
	.then(() => {
		if (program.opts().timing) {
			const elapsed = Math.round(performance.now() - t0);
			process.stderr.write(`[timing] ${elapsed}ms\n`);
		}
	})
	.catch((err: unknown) => {
		if (program.opts().timing) {
			const elapsed = Math.round(performance.now() - t0);
			process.stderr.write(`[timing] ${elapsed}ms\n`);
		}
		if (err instanceof ExitError) {
			process.exitCode = err.exitCode;
			return;
		}
		const msg = err instanceof Error ? err.message : String(err);
		const command = process.argv[2] ?? "";
		const json = isJsonMode(process.argv.slice(2));
		if (json) {
			jsonOut({ success: false, command, error: msg });
		} else {
			errorOut(`Error: ${msg}`);
		}
		process.exitCode = 1;
	});
