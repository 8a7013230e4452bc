// Runtime registry: maps runtime names to adapter factory functions.
// This is the ONLY module that imports concrete adapter classes.

import { ValidationError } from "../errors.ts";
import type { CrewConfig } from "../types.ts";
import { ClaudeRuntime } from "./claude.ts";
import { CodexRuntime } from "./codex.ts";
import type { AgentRuntime } from "./types.ts";

/** Registry of runtime adapters (name → factory). */
const runtimes = new Map<string, () => AgentRuntime>([
	["claude", () => new ClaudeRuntime()],
	["codex", () => new CodexRuntime()],
]);

/** Names of all registered runtimes, in registration order. */
export function runtimeNames(): string[] {
	return [...runtimes.keys()];
}

/**
 * Resolve a runtime adapter by name.
 *
 * Lookup order:
 * 1. Explicit `name` argument (if provided)
 * 2. `config.runtime.default` (if config is provided)
 * 3. `"claude"` (hardcoded fallback)
 *
 * @throws {ValidationError} If the resolved runtime name is not registered.
 * @returns A fresh AgentRuntime instance.
 */
export function getRuntime(name?: string, config?: CrewConfig): AgentRuntime {
	const runtimeName = name ?? config?.runtime.default ?? "claude";

	const factory = runtimes.get(runtimeName);
	if (!factory) {
		throw new ValidationError(
			`Unknown runtime: "${runtimeName}". Available: ${runtimeNames().join(", ")}`,
			{ field: "runtime", value: runtimeName },
		);
	}
	return factory();
}
