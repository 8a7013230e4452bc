/**
 * CLI command: crew list [--role <role>] [--json]
 *
 * Shows the crew sessions tmux currently has, grouped by role.
 * Sessions that do not follow crew naming are ignored.
 */

import { Command } from "commander";
import { loadConfig } from "../config.ts";
import { jsonOutput } from "../json.ts";
import { type ParsedSessionName, parseSessionName } from "../launch/namer.ts";
import { accent, muted, printHint } from "../logging/color.ts";
import { TmuxMultiplexer } from "../mux/tmux.ts";
import type { Multiplexer } from "../mux/types.ts";
import { parseRole } from "../roles.ts";
import { ROLE_IDS, type Role } from "../types.ts";

export interface ListOptions {
	role?: string;
	json?: boolean;
	config?: string;
	_multiplexer?: Multiplexer;
}

export interface CrewSession extends ParsedSessionName {
	name: string;
}

/**
 * Pick the crew sessions out of a set of tmux session names, optionally for
 * one role, ordered by role (declaration order), index, then suffix.
 */
export function selectCrewSessions(
	names: Iterable<string>,
	prefix: string,
	role?: Role,
): CrewSession[] {
	const sessions: CrewSession[] = [];
	for (const name of names) {
		const parsed = parseSessionName(name, prefix);
		if (parsed === null) continue;
		if (role !== undefined && parsed.role !== role) continue;
		sessions.push({ name, ...parsed });
	}
	return sessions.sort(
		(a, b) =>
			ROLE_IDS.indexOf(a.role) - ROLE_IDS.indexOf(b.role) ||
			a.index - b.index ||
			(a.suffix ?? -1) - (b.suffix ?? -1),
	);
}

export async function listCommand(opts: ListOptions): Promise<CrewSession[]> {
	const role = opts.role !== undefined ? parseRole(opts.role) : undefined;
	const config = await loadConfig(process.cwd(), opts.config);
	const multiplexer = opts._multiplexer ?? new TmuxMultiplexer({ command: config.tmux.command });

	const sessions = selectCrewSessions(
		await multiplexer.listSessionNames(),
		config.sessions.prefix,
		role,
	);

	if (opts.json) {
		jsonOutput("list", { sessions });
		return sessions;
	}

	if (sessions.length === 0) {
		process.stdout.write("No crew sessions running.\n");
		return sessions;
	}

	let currentRole: Role | null = null;
	for (const session of sessions) {
		if (session.role !== currentRole) {
			currentRole = session.role;
			process.stdout.write(`${currentRole}\n`);
		}
		process.stdout.write(`  ${accent(session.name)} ${muted(`#${session.index}`)}\n`);
	}
	printHint(`${sessions.length} session(s). Attach with: tmux attach -t <session>`);
	return sessions;
}

export function createListCommand(): Command {
	return new Command("list")
		.description("List running crew sessions")
		.option("--role <role>", `Only sessions of this role: ${ROLE_IDS.join(" | ")}`)
		.option("--json", "Output as JSON")
		.action(async (opts: ListOptions, cmd: Command) => {
			const globals = cmd.optsWithGlobals<{ config?: string }>();
			await listCommand({ ...opts, config: globals.config });
		});
}
