import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parse, stringify } from "yaml";
import { fromFsError } from "./errors.js";
import type { Config } from "./types.js";
import { CONFIG_FILE, DEFAULT_EXTENSIONS } from "./types.js";

export interface LoadedConfig {
	config: Config;
	/** Fields that were present but unusable and fell back to defaults. */
	warnings: string[];
}

export function defaultConfig(): Config {
	return { extensions: [...DEFAULT_EXTENSIONS], languages: {} };
}

export function parseConfig(text: string): LoadedConfig {
	const config = defaultConfig();
	const warnings: string[] = [];
	const parsed: unknown = parse(text);
	if (parsed === null || parsed === undefined) return { config, warnings };
	if (typeof parsed !== "object" || Array.isArray(parsed)) {
		return { config, warnings: [`${CONFIG_FILE} must be a mapping`] };
	}

	const raw = new Map<string, unknown>(Object.entries(parsed));

	const extensions = raw.get("extensions");
	if (extensions !== undefined) {
		if (Array.isArray(extensions) && extensions.every((e) => typeof e === "string")) {
			config.extensions = extensions.map((e: string) => e.replace(/^\./, "").toLowerCase());
		} else {
			warnings.push("extensions must be a list of strings");
		}
	}

	const languages = raw.get("languages");
	if (languages !== undefined) {
		if (typeof languages === "object" && languages !== null && !Array.isArray(languages)) {
			for (const [ext, lang] of Object.entries(languages)) {
				if (typeof lang === "string") {
					config.languages[ext.replace(/^\./, "").toLowerCase()] = lang;
				} else {
					warnings.push(`languages.${ext} must be a string`);
				}
			}
		} else {
			warnings.push("languages must be a mapping of extension to language");
		}
	}

	return { config, warnings };
}

export async function loadConfig(dir: string): Promise<LoadedConfig> {
	let text: string;
	try {
		text = await readFile(join(dir, CONFIG_FILE), "utf8");
	} catch (cause: unknown) {
		if (fromFsError(CONFIG_FILE, cause).kind !== "FileNotFound") throw cause;
		return { config: defaultConfig(), warnings: [] };
	}
	return parseConfig(text);
}

export async function saveConfig(dir: string, config: Config): Promise<void> {
	const obj: Record<string, string[] | Record<string, string>> = {
		extensions: config.extensions,
	};
	if (Object.keys(config.languages).length > 0) {
		obj.languages = config.languages;
	}
	await writeFile(join(dir, CONFIG_FILE), stringify(obj));
}
