import chalk from "chalk";

let quiet = false;
let verbose = false;

export function setQuiet(value: boolean): void {
	quiet = value;
}

export function setVerbose(value: boolean): void {
	verbose = value;
}

export function jsonOut(data: unknown): void {
	console.log(JSON.stringify(data, null, 2));
}

export function humanOut(text: string): void {
	if (quiet) return;
	console.log(text);
}

/** Diagnostics shown only with --verbose, on stderr so stdout stays clean. */
export function verboseOut(text: string): void {
	if (!verbose || quiet) return;
	console.error(chalk.dim(text));
}

export function errorOut(msg: string): void {
	console.error(msg);
}

export function isJsonMode(args: string[]): boolean {
	return args.includes("--json");
}

// chalk handles NO_COLOR and TTY detection
export const palette = {
	brand: chalk.rgb(94, 129, 172), // slate blue
	muted: chalk.rgb(120, 120, 110),
};

export const c = {
	bold: (s: string) => chalk.bold(s),
	dim: (s: string) => chalk.dim(s),
	green: (s: string) => chalk.green(s),
	red: (s: string) => chalk.red(s),
	yellow: (s: string) => chalk.yellowBright(s),
	cyan: (s: string) => chalk.cyan(s),
	file: (s: string) => chalk.blue.bold(s),
};

export const fmt = {
	success: (msg: string) => `${chalk.green.bold("✓")} ${chalk.green(msg)}`,
	error: (msg: string, hint?: string) =>
		hint
			? `${chalk.red.bold("✗")} ${chalk.red(msg)} ${chalk.dim(hint)}`
			: `${chalk.red.bold("✗")} ${chalk.red(msg)}`,
	info: (msg: string) => chalk.dim(`  ${msg}`),
};
