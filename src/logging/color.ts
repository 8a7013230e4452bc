/**
 * Central color and output control using Chalk.
 *
 * Chalk natively handles NO_COLOR, FORCE_COLOR, and TERM=dumb.
 * See https://github.com/chalk/chalk#supportscolor for detection logic.
 */

import chalk from "chalk";

// --- Palette ---

/** Slate blue: crew primary color. */
export const brand = chalk.rgb(70, 100, 180);

/** Amber: highlights (session names, ids). */
export const accent = chalk.rgb(255, 183, 77);

/** Stone gray: secondary text, muted content. */
export const muted = chalk.rgb(120, 120, 110);

// --- Standard color functions ---

/**
 * Color functions that wrap text with ANSI codes.
 * Chalk auto-resets when wrapping, so color.reset is not needed.
 */
export const color = {
	bold: chalk.bold,
	dim: chalk.dim,
	red: chalk.red,
	green: chalk.green,
	yellow: chalk.yellow,
	cyan: chalk.cyan,
	gray: chalk.gray,
} as const;

export { chalk };

/** Type for color function values (for consumers that store colors in variables). */
export type ColorFn = (text: string) => string;

// --- ANSI strip utilities ---

// biome-ignore lint/suspicious/noControlCharactersInRegex: ESC (0x1B) is required to match ANSI escape sequences
const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

/** Strip ANSI escape codes from a string. */
export function stripAnsi(str: string): string {
	return str.replace(ANSI_REGEX, "");
}

// --- Quiet mode ---

let quietMode = false;

/** Enable quiet mode (suppress non-error output). */
export function setQuiet(enabled: boolean): void {
	quietMode = enabled;
}

export function isQuiet(): boolean {
	return quietMode;
}

// --- Message formatters ---

/** Success: brand checkmark + brand message. Optional accent-colored ID. */
export function printSuccess(msg: string, id?: string): void {
	if (isQuiet()) return;
	const idPart = id ? ` ${accent(id)}` : "";
	console.log(`${brand.bold("✓")} ${brand(msg)}${idPart}`);
}

/** Warning: yellow ! + yellow message. Optional dim hint. Always to stderr. */
export function printWarning(msg: string, hint?: string): void {
	if (isQuiet()) return;
	const hintPart = hint ? ` ${chalk.dim(`— ${hint}`)}` : "";
	console.error(`${chalk.yellow.bold("!")} ${chalk.yellow(msg)}${hintPart}`);
}

/** Error: red cross + red message. Optional dim hint. Always to stderr. */
export function printError(msg: string, hint?: string): void {
	const hintPart = hint ? ` ${chalk.dim(`— ${hint}`)}` : "";
	console.error(`${chalk.red.bold("✗")} ${chalk.red(msg)}${hintPart}`);
}

/** Hint/info: dim indented text. */
export function printHint(msg: string): void {
	if (isQuiet()) return;
	console.log(chalk.dim(`  ${msg}`));
}
