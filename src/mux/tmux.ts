/**
 * tmux implementation of the Multiplexer boundary.
 *
 * Targets use tmux's exact-match syntax (`=name`) so that `worker-1` can
 * never resolve to `worker-10` by prefix.
 */

import { BoundaryError, errorMessage } from "../errors.ts";
import { defaultSpawner, type SpawnResult, type Spawner } from "../spawn.ts";
import type { CreateSessionOpts, Multiplexer } from "./types.ts";

// stderr fragments tmux prints when there is simply nothing running.
const NO_SERVER_PATTERNS = ["no server running", "no sessions", "error connecting to"];

/** Exact-match session target (for has/kill-session). */
export function sessionTarget(name: string): string {
	return `=${name}`;
}

/** Exact-match pane target: the active pane of the session's current window. */
export function paneTarget(name: string): string {
	return `=${name}:`;
}

export function buildNewSessionArgs(
	command: string,
	name: string,
	opts: CreateSessionOpts,
): string[] {
	const args = [command, "new-session", "-d", "-s", name, "-c", opts.cwd];
	for (const [key, value] of Object.entries(opts.env)) {
		args.push("-e", `${key}=${value}`);
	}
	return args;
}

export class TmuxMultiplexer implements Multiplexer {
	private readonly command: string;
	private readonly spawner: Spawner;

	constructor(opts: { command?: string; spawner?: Spawner } = {}) {
		this.command = opts.command ?? "tmux";
		this.spawner = opts.spawner ?? defaultSpawner;
	}

	async createSession(name: string, opts: CreateSessionOpts): Promise<void> {
		await this.run(buildNewSessionArgs(this.command, name, opts), "new-session", name);
	}

	async sendCommand(name: string, text: string): Promise<void> {
		// -l sends the text literally (no key-name lookup); Enter goes separately.
		await this.run(
			[this.command, "send-keys", "-t", paneTarget(name), "-l", "--", text],
			"send-keys",
			name,
		);
		await this.run([this.command, "send-keys", "-t", paneTarget(name), "Enter"], "send-keys", name);
	}

	async listSessionNames(): Promise<Set<string>> {
		const result = await this.exec([this.command, "list-sessions", "-F", "#{session_name}"]);
		if (result.exitCode !== 0) {
			const stderr = result.stderr.toLowerCase();
			if (NO_SERVER_PATTERNS.some((p) => stderr.includes(p))) {
				return new Set();
			}
			throw new BoundaryError(
				`${this.command} list-sessions failed (exit ${result.exitCode}): ${result.stderr.trim()}`,
				{ boundary: "multiplexer" },
			);
		}
		return new Set(
			result.stdout
				.split("\n")
				.map((line) => line.trim())
				.filter((line) => line.length > 0),
		);
	}

	async killSession(name: string): Promise<void> {
		await this.run([this.command, "kill-session", "-t", sessionTarget(name)], "kill-session", name);
	}

	private async exec(args: string[], sessionName?: string): Promise<SpawnResult> {
		try {
			return await this.spawner(args);
		} catch (err) {
			throw new BoundaryError(`Cannot run ${this.command}: ${errorMessage(err)}`, {
				boundary: "multiplexer",
				sessionName,
				cause: err,
			});
		}
	}

	private async run(args: string[], context: string, sessionName: string): Promise<void> {
		const result = await this.exec(args, sessionName);
		if (result.exitCode !== 0) {
			throw new BoundaryError(
				`${this.command} ${context} failed for "${sessionName}" (exit ${result.exitCode}): ${result.stderr.trim()}`,
				{ boundary: "multiplexer", sessionName },
			);
		}
	}
}
