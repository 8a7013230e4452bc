/**
 * CLI command: crew stop [names...] [--role <role>] [--all] [--json]
 *
 * Kills crew sessions. --role and --all only ever match crew-named sessions;
 * explicit names are killed as given. Each kill is independent: one failure
 * is reported and the rest still run.
 */

import { Command } from "commander";
import { loadConfig } from "../config.ts";
import { errorMessage, ValidationError } from "../errors.ts";
import { jsonOutput } from "../json.ts";
import { printError, printSuccess } from "../logging/color.ts";
import { TmuxMultiplexer } from "../mux/tmux.ts";
import type { Multiplexer } from "../mux/types.ts";
import { parseRole } from "../roles.ts";
import { selectCrewSessions } from "./list.ts";

export interface StopOptions {
	role?: string;
	all?: boolean;
	json?: boolean;
	config?: string;
	_multiplexer?: Multiplexer;
}

export interface StopResult {
	name: string;
	stopped: boolean;
	error?: string;
}

export async function stopCommand(names: string[], opts: StopOptions): Promise<StopResult[]> {
	const all = opts.all ?? false;
	const role = opts.role !== undefined ? parseRole(opts.role) : undefined;
	if (names.length === 0 && role === undefined && !all) {
		throw new ValidationError("Name the sessions to stop, or pass --role <role> or --all", {
			field: "names",
		});
	}

	const config = await loadConfig(process.cwd(), opts.config);
	const multiplexer = opts._multiplexer ?? new TmuxMultiplexer({ command: config.tmux.command });

	const targets = new Set(names);
	if (role !== undefined || all) {
		const live = await multiplexer.listSessionNames();
		for (const session of selectCrewSessions(live, config.sessions.prefix, role)) {
			targets.add(session.name);
		}
	}

	const results: StopResult[] = [];
	for (const name of targets) {
		try {
			await multiplexer.killSession(name);
			results.push({ name, stopped: true });
		} catch (err) {
			results.push({ name, stopped: false, error: errorMessage(err) });
		}
	}

	const failures = results.filter((r) => !r.stopped);
	if (opts.json) {
		jsonOutput("stop", { results });
	} else if (results.length === 0) {
		process.stdout.write("No matching crew sessions.\n");
	} else {
		for (const result of results) {
			if (result.stopped) {
				printSuccess("Stopped", result.name);
			} else {
				printError(`Failed to stop ${result.name}`, result.error);
			}
		}
	}

	if (failures.length > 0) {
		process.exitCode = 1;
	}
	return results;
}

export function createStopCommand(): Command {
	return new Command("stop")
		.description("Kill crew sessions")
		.argument("[names...]", "Session names to kill")
		.option("--role <role>", "Kill every crew session of this role")
		.option("--all", "Kill every crew session")
		.option("--json", "Output as JSON")
		.action(async (names: string[], opts: StopOptions, cmd: Command) => {
			const globals = cmd.optsWithGlobals<{ config?: string }>();
			await stopCommand(names, { ...opts, config: globals.config });
		});
}
