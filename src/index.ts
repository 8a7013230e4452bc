#!/usr/bin/env tsx

/**
 * crew CLI: main entry point and command router.
 *
 * Routes subcommands to their handlers in src/commands/.
 * Usage: crew <command> [args...]
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { Command, Help } from "commander";
import { createDoctorCommand } from "./commands/doctor.ts";
import { createLaunchCommand } from "./commands/launch.ts";
import { createListCommand } from "./commands/list.ts";
import { createStopCommand } from "./commands/stop.ts";
import { CrewError } from "./errors.ts";
import { jsonError } from "./json.ts";
import { brand, chalk, muted, setQuiet } from "./logging/color.ts";
import { formatDuration } from "./logging/format.ts";

export const VERSION = "0.1.0";

export const COMMANDS = ["launch", "list", "stop", "doctor"];

export function editDistance(a: string, b: string): number {
	const m = a.length;
	const n = b.length;
	// Flat 1D table; noUncheckedIndexedAccess makes nested rows noisy
	const dp = new Array<number>((m + 1) * (n + 1)).fill(0);
	const idx = (i: number, j: number) => i * (n + 1) + j;
	for (let i = 0; i <= m; i++) dp[idx(i, 0)] = i;
	for (let j = 0; j <= n; j++) dp[idx(0, j)] = j;
	for (let i = 1; i <= m; i++) {
		for (let j = 1; j <= n; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			const del = (dp[idx(i - 1, j)] ?? 0) + 1;
			const ins = (dp[idx(i, j - 1)] ?? 0) + 1;
			const sub = (dp[idx(i - 1, j - 1)] ?? 0) + cost;
			dp[idx(i, j)] = Math.min(del, ins, sub);
		}
	}
	return dp[idx(m, n)] ?? 0;
}

/** Closest known command within edit distance 2, if any. */
export function suggestCommand(input: string): string | undefined {
	let bestMatch: string | undefined;
	let bestDist = 3;
	for (const cmd of COMMANDS) {
		const dist = editDistance(input, cmd);
		if (dist < bestDist) {
			bestDist = dist;
			bestMatch = cmd;
		}
	}
	return bestMatch;
}

export function createProgram(): Command {
	const program = new Command();
	let timingStart: number | undefined;

	program
		.name("crew")
		.description("Launch replicated coding-agent sessions in tmux")
		.version(VERSION, "-v, --version", "Print version")
		.option("-q, --quiet", "Suppress non-error output")
		.option("--verbose", "Verbose output")
		.option("--config <path>", "Config file (default: .crew/config.yaml)")
		.option("--timing", "Print command execution time to stderr")
		.addHelpCommand(false)
		.configureHelp({
			formatHelp(cmd, helper): string {
				if (cmd.parent) {
					return Help.prototype.formatHelp.call(helper, cmd, helper);
				}

				const COL_WIDTH = 20;
				const lines: string[] = [];

				lines.push(`${brand.bold("crew")} ${muted(`v${VERSION}`)}  replicated agent sessions`);
				lines.push("");
				lines.push(`Usage: ${chalk.dim("crew")} <command> [options]`);
				lines.push("");

				const visibleCmds = helper.visibleCommands(cmd);
				if (visibleCmds.length > 0) {
					lines.push("Commands:");
					for (const sub of visibleCmds) {
						const term = helper.subcommandTerm(sub);
						const firstSpace = term.indexOf(" ");
						const name = firstSpace >= 0 ? term.slice(0, firstSpace) : term;
						const args = firstSpace >= 0 ? ` ${term.slice(firstSpace + 1)}` : "";
						const coloredTerm = `${chalk.green(name)}${args ? chalk.dim(args) : ""}`;
						const padding = " ".repeat(Math.max(2, COL_WIDTH - term.length));
						lines.push(`  ${coloredTerm}${padding}${helper.subcommandDescription(sub)}`);
					}
					lines.push("");
				}

				const visibleOpts = helper.visibleOptions(cmd);
				if (visibleOpts.length > 0) {
					lines.push("Options:");
					for (const opt of visibleOpts) {
						const flags = helper.optionTerm(opt);
						const padding = " ".repeat(Math.max(2, COL_WIDTH - flags.length));
						lines.push(`  ${chalk.dim(flags)}${padding}${helper.optionDescription(opt)}`);
					}
					lines.push("");
				}

				lines.push(`Run '${chalk.dim("crew")} <command> --help' for command-specific help.`);
				return `${lines.join("\n")}\n`;
			},
		});

	program.hook("preAction", (thisCmd) => {
		const opts = thisCmd.optsWithGlobals<{ quiet?: boolean; timing?: boolean }>();
		if (opts.quiet) {
			setQuiet(true);
		}
		if (opts.timing) {
			timingStart = performance.now();
		}
	});
	program.hook("postAction", () => {
		if (program.opts<{ timing?: boolean }>().timing && timingStart !== undefined) {
			const elapsed = performance.now() - timingStart;
			process.stderr.write(`${muted(`Done in ${formatDuration(elapsed)}`)}\n`);
		}
	});

	program.addCommand(createLaunchCommand());
	program.addCommand(createListCommand());
	program.addCommand(createStopCommand());
	program.addCommand(createDoctorCommand());

	// Unknown commands get an edit-distance suggestion
	program.on("command:*", (operands: string[]) => {
		const unknown = operands[0] ?? "";
		process.stderr.write(`Unknown command: ${unknown}\n`);
		const suggestion = suggestCommand(unknown);
		if (suggestion) {
			process.stderr.write(`Did you mean '${suggestion}'?\n`);
		}
		process.stderr.write("Run 'crew --help' for usage.\n");
		process.exitCode = 1;
	});

	return program;
}

/** Print a top-level failure the way every command reports errors. */
export function reportError(err: unknown, argv: readonly string[]): void {
	const useJson = argv.includes("--json");
	if (err instanceof CrewError) {
		if (useJson) {
			jsonError("crew", err.message);
		} else {
			process.stderr.write(`Error [${err.code}]: ${err.message}\n`);
		}
	} else if (err instanceof Error) {
		if (useJson) {
			jsonError("crew", err.message);
		} else {
			process.stderr.write(`Error: ${err.message}\n`);
			if (argv.includes("--verbose")) {
				process.stderr.write(`${err.stack}\n`);
			}
		}
	} else if (useJson) {
		jsonError("crew", String(err));
	} else {
		process.stderr.write(`Unknown error: ${String(err)}\n`);
	}
	process.exitCode = 1;
}

async function main(): Promise<void> {
	await createProgram().parseAsync(process.argv);
}

function isDirectRun(): boolean {
	const entry = process.argv[1];
	if (entry === undefined) return false;
	try {
		return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
	} catch {
		return false;
	}
}

if (isDirectRun()) {
	main().catch((err: unknown) => reportError(err, process.argv));
}
