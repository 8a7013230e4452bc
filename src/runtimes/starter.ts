import { BoundaryError, errorMessage } from "../errors.ts";
import type { Multiplexer } from "../mux/types.ts";
import { defaultSpawner, type SpawnResult, type Spawner } from "../spawn.ts";
import type { AgentRuntime, AgentStarter, StartOpts } from "./types.ts";

/**
 * Agent-process boundary on top of a multiplexer: builds the runtime's start
 * command and types it into the session's shell. The agent outlives the
 * launcher; nothing here waits for it.
 *
 * The shell accepts the command whether or not the binary exists, so the
 * binary is resolved once per run (`<binary> --version`) before any session
 * is created for it.
 */
export class RuntimeAgentStarter implements AgentStarter {
	private availability: Promise<void> | null = null;

	constructor(
		private readonly multiplexer: Multiplexer,
		private readonly runtime: AgentRuntime,
		private readonly opts: Omit<StartOpts, "prompt">,
		private readonly spawner: Spawner = defaultSpawner,
	) {}

	checkAvailable(): Promise<void> {
		if (this.availability === null) {
			this.availability = this.versionCheck();
		}
		return this.availability;
	}

	async startAgent(sessionName: string, instruction: string): Promise<void> {
		const command = this.runtime.buildStartCommand({ ...this.opts, prompt: instruction });
		try {
			await this.multiplexer.sendCommand(sessionName, command);
		} catch (err) {
			throw new BoundaryError(
				`Failed to start ${this.runtime.id} in "${sessionName}": ${errorMessage(err)}`,
				{ boundary: "agent", sessionName, cause: err },
			);
		}
	}

	private async versionCheck(): Promise<void> {
		const { binary } = this.runtime;
		let result: SpawnResult;
		try {
			result = await this.spawner([binary, "--version"]);
		} catch (err) {
			throw new BoundaryError(`Agent binary "${binary}" not found: ${errorMessage(err)}`, {
				boundary: "agent",
				cause: err,
			});
		}
		if (result.exitCode !== 0) {
			throw new BoundaryError(
				`Agent binary "${binary}" failed its version check (exit ${result.exitCode}): ${result.stderr.trim()}`,
				{ boundary: "agent" },
			);
		}
	}
}
