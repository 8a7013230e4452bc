// Codex runtime adapter for the AgentRuntime interface.
//
// Key differences from the Claude adapter:
// - Approvals: --full-auto (workspace-write sandbox + automatic approvals)
//   stands in for Claude's permission modes; ask mode simply omits it.
// - Models belong to the "openai" provider.

import type { ModelRef } from "../types.ts";
import { resolveForProvider } from "./model.ts";
import { shellQuote } from "./shell.ts";
import type { AgentRuntime, StartOpts } from "./types.ts";

export class CodexRuntime implements AgentRuntime {
	readonly id = "codex";
	readonly binary = "codex";
	readonly provider = "openai";

	/**
	 * Build the shell command that starts the Codex TUI with an initial prompt.
	 *
	 * Format: `codex [--model <m>] [--full-auto] '<prompt>'`
	 */
	buildStartCommand(opts: StartOpts): string {
		const parts = [this.binary];
		if (opts.model !== undefined) {
			parts.push("--model", opts.model);
		}
		if (opts.permissionMode === "bypass") {
			parts.push("--full-auto");
		}
		parts.push(shellQuote(opts.prompt));
		return parts.join(" ");
	}

	resolveModel(ref: ModelRef): string {
		return resolveForProvider(ref, this.provider, this.id);
	}
}
