// Claude Code runtime adapter.
// Starts `claude` interactively with the rendered instruction as its first message.

import type { ModelRef } from "../types.ts";
import { resolveForProvider } from "./model.ts";
import { shellQuote } from "./shell.ts";
import type { AgentRuntime, StartOpts } from "./types.ts";

export class ClaudeRuntime implements AgentRuntime {
	readonly id = "claude";
	readonly binary = "claude";
	readonly provider = "anthropic";

	/**
	 * Build the shell command that starts Claude Code in a tmux pane.
	 *
	 * Format: `claude [--model <m>] --permission-mode <mode> '<prompt>'`
	 * The prompt is single-quote escaped so it survives the pane's shell intact.
	 */
	buildStartCommand(opts: StartOpts): string {
		const parts = [this.binary];
		if (opts.model !== undefined) {
			parts.push("--model", opts.model);
		}
		const mode = opts.permissionMode === "bypass" ? "bypassPermissions" : "default";
		parts.push("--permission-mode", mode, shellQuote(opts.prompt));
		return parts.join(" ");
	}

	resolveModel(ref: ModelRef): string {
		return resolveForProvider(ref, this.provider, this.id);
	}
}
