import { existsSync } from "node:fs";
import { join } from "node:path";
import type { Command } from "commander";
import { defaultConfig, saveConfig } from "../config.js";
import { errorOut, fmt, humanOut, jsonOut } from "../output.js";
import { CONFIG_FILE, ExitError } from "../types.js";

export default async function init(args: string[], json: boolean): Promise<void> {
	const cwd = process.cwd();
	const configPath = join(cwd, CONFIG_FILE);

	if (args.includes("--help") || args.includes("-h")) {
		humanOut(`Usage: snips init

Writes a default ${CONFIG_FILE} in the current directory.`);
		return;
	}

	if (existsSync(configPath)) {
		if (json) {
			jsonOut({ success: false, command: "init", error: `${CONFIG_FILE} already exists` });
		} else {
			errorOut(fmt.error(`${CONFIG_FILE} already exists`));
		}
		throw new ExitError(1);
	}

	const config = defaultConfig();
	await saveConfig(cwd, config);

	if (json) {
		jsonOut({ success: true, command: "init", path: configPath, config });
	} else {
		humanOut(fmt.success(`Created ${CONFIG_FILE}`));
		humanOut(fmt.info(`extensions: ${config.extensions.join(", ")}`));
	}
}

export function register(program: Command): void {
	program
		.command("init")
		.description(`Write a default ${CONFIG_FILE}`)
		.option("--json", "Output as JSON")
		.action(async (options: { json?: boolean }) => {
			const args = options.json ? ["--json"] : [];
			await init(args, options.json ?? false);
		});
}
