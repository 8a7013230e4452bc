/**
 * Formatting helpers for launch plans, launch reports and session listings.
 */

import type { LaunchResult, ReplicaDraft } from "../types.ts";
import { accent, color } from "./color.ts";
import { stateIconColored } from "./theme.ts";

/**
 * Formats a duration in milliseconds to a human-readable string.
 * Examples: "0ms", "850ms", "1.25s", "3m 45s"
 */
export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
	const totalSeconds = Math.floor(ms / 1000);
	const minutes = Math.floor(totalSeconds / 60);
	const seconds = totalSeconds % 60;
	return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
}

/** Comma-joined task ids, or "(none)" for an empty assignment. */
export function formatTasks(tasks: readonly string[]): string {
	return tasks.length > 0 ? tasks.join(", ") : "(none)";
}

/** Pad a (plain) session name to a column width. */
function column(name: string, width: number): string {
	return name.padEnd(width);
}

/** Width that fits every session name in a report. */
export function nameColumnWidth(names: readonly string[]): number {
	return Math.max(8, ...names.map((n) => n.length)) + 2;
}

/** One line of a --dry-run plan: name, tasks, and the naming error if any. */
export function formatPlanLine(draft: ReplicaDraft, width: number): string {
	const { plan } = draft;
	const name = accent(column(plan.sessionName, width));
	const tasks = `tasks: ${formatTasks(plan.assignedTasks)}`;
	if (draft.status === "unnamed") {
		return `  ${stateIconColored("failed")} ${name}${color.red(draft.error.message)}`;
	}
	return `  ${stateIconColored("planned")} ${name}${tasks}`;
}

/** One line of a launch report. Failed replicas show their error code and detail. */
export function formatResultLine(result: LaunchResult, width: number): string {
	const name = accent(column(result.plan.sessionName, width));
	if (result.outcome === "failed") {
		return `  ${stateIconColored("failed")} ${name}${color.red(`[${result.errorCode}] ${result.errorDetail}`)}`;
	}
	return `  ${stateIconColored("started")} ${name}tasks: ${formatTasks(result.plan.assignedTasks)}`;
}

/** Serializable view of a launch result for --json output. */
export function resultToJson(result: LaunchResult): Record<string, unknown> {
	const base = {
		index: result.plan.index,
		sessionName: result.plan.sessionName,
		assignedTasks: [...result.plan.assignedTasks],
		outcome: result.outcome,
	};
	return result.outcome === "failed"
		? { ...base, errorCode: result.errorCode, errorDetail: result.errorDetail }
		: base;
}
