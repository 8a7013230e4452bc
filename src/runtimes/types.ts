// Runtime abstraction: how to start each supported agent CLI inside a session.

import type { ModelRef, PermissionMode } from "../types.ts";

/** Options for starting an interactive agent process. */
export interface StartOpts {
	/** Full instruction text handed to the agent as its first message. */
	prompt: string;
	/** Resolved model name for the runtime's --model flag. Omitted when undefined. */
	model?: string;
	/** bypass: the agent runs without approval prompts. ask: the runtime's default approvals. */
	permissionMode: PermissionMode;
}

/**
 * Contract every agent runtime adapter implements. The launcher calls only
 * these methods, never the runtime's CLI directly.
 */
export interface AgentRuntime {
	/** Unique runtime identifier (e.g. "claude", "codex"). */
	readonly id: string;

	/** Executable the start command invokes (checked by `crew doctor`). */
	readonly binary: string;

	/** Provider that owns this runtime's models, for provider-qualified model refs. */
	readonly provider: string;

	/** Build the shell command line that starts the agent with its instruction. */
	buildStartCommand(opts: StartOpts): string;

	/**
	 * Turn a model ref into the value for --model.
	 * @throws ValidationError when the ref names another provider
	 */
	resolveModel(ref: ModelRef): string;
}

/** The agent-process boundary: start an agent with its instruction inside a session. */
export interface AgentStarter {
	/**
	 * Reject with a BoundaryError when the agent cannot run at all (binary
	 * missing or broken). Called before each replica's session is created;
	 * implementations check once per run.
	 */
	checkAvailable(): Promise<void>;

	startAgent(sessionName: string, instruction: string): Promise<void>;
}
