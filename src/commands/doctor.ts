/**
 * CLI command: crew doctor [--json] [--category <name>]
 *
 * Checks that tmux and the agent CLIs are installed and that the
 * configuration is usable.
 */

import { Command } from "commander";
import { loadConfig } from "../config.ts";
import { checkConfig } from "../doctor/config-check.ts";
import { checkDependencies } from "../doctor/dependencies.ts";
import type { DoctorCategory, DoctorCheck, DoctorCheckFn } from "../doctor/types.ts";
import { ValidationError } from "../errors.ts";
import { jsonOutput } from "../json.ts";
import { color } from "../logging/color.ts";
import { defaultSpawner, type Spawner } from "../spawn.ts";

/** Registry of all check modules in execution order. */
const ALL_CHECKS: Array<{ category: DoctorCategory; fn: DoctorCheckFn }> = [
	{ category: "dependencies", fn: checkDependencies },
	{ category: "config", fn: checkConfig },
];

function isCategory(value: string): value is DoctorCategory {
	return ALL_CHECKS.some((c) => c.category === value);
}

function printHumanReadable(checks: DoctorCheck[], verbose: boolean): void {
	const w = process.stdout.write.bind(process.stdout);

	w(`${color.bold("Crew Doctor")}\n\n`);

	for (const { category } of ALL_CHECKS) {
		const categoryChecks = checks.filter((c) => c.category === category);
		if (categoryChecks.length === 0) continue;

		w(`${color.bold(`[${category}]`)}\n`);
		for (const check of categoryChecks) {
			if (check.status === "pass" && !verbose) continue;

			const icon =
				check.status === "pass"
					? color.green("-")
					: check.status === "warn"
						? color.yellow("!")
						: color.red("x");
			w(`  ${icon} ${check.message}\n`);
			for (const detail of check.details ?? []) {
				w(`    ${color.dim(`> ${detail}`)}\n`);
			}
		}
		w("\n");
	}

	const { pass, warn, fail } = summarize(checks);
	w(
		`${color.bold("Summary:")} ${color.green(`${pass} passed`)}, ${color.yellow(`${warn} warning${warn === 1 ? "" : "s"}`)}, ${color.red(`${fail} failure${fail === 1 ? "" : "s"}`)}\n`,
	);
}

export function summarize(checks: DoctorCheck[]): { pass: number; warn: number; fail: number } {
	return {
		pass: checks.filter((c) => c.status === "pass").length,
		warn: checks.filter((c) => c.status === "warn").length,
		fail: checks.filter((c) => c.status === "fail").length,
	};
}

export interface DoctorOptions {
	json?: boolean;
	verbose?: boolean;
	category?: string;
	config?: string;
	/** Injected spawner (tests). */
	_spawner?: Spawner;
}

/**
 * Entry point for `crew doctor`. Sets process.exitCode to 1 when any check fails.
 */
export async function doctorCommand(opts: DoctorOptions): Promise<DoctorCheck[]> {
	const categoryFilter = opts.category;
	if (categoryFilter !== undefined && !isCategory(categoryFilter)) {
		throw new ValidationError(
			`Invalid category: ${categoryFilter}. Valid categories: ${ALL_CHECKS.map((c) => c.category).join(", ")}`,
			{ field: "category", value: categoryFilter },
		);
	}

	const cwd = process.cwd();
	const config = await loadConfig(cwd, opts.config);
	const ctx = { cwd, config, configPath: opts.config, spawner: opts._spawner ?? defaultSpawner };

	const results: DoctorCheck[] = [];
	for (const { category, fn } of ALL_CHECKS) {
		if (categoryFilter !== undefined && category !== categoryFilter) continue;
		results.push(...(await fn(ctx)));
	}

	if (opts.json) {
		jsonOutput("doctor", { checks: results, summary: summarize(results) });
	} else {
		printHumanReadable(results, opts.verbose ?? false);
	}

	if (results.some((c) => c.status === "fail")) {
		process.exitCode = 1;
	}
	return results;
}

export function createDoctorCommand(): Command {
	return new Command("doctor")
		.description("Check that tmux, the agent CLIs and the config are usable")
		.option("--json", "Output as JSON")
		.option("--category <name>", "Run only one category")
		.addHelpText("after", `\nCategories: ${ALL_CHECKS.map((c) => c.category).join(", ")}`)
		.action(async (opts: DoctorOptions, cmd: Command) => {
			const globals = cmd.optsWithGlobals<{ config?: string; verbose?: boolean }>();
			await doctorCommand({ ...opts, config: globals.config, verbose: globals.verbose });
		});
}
