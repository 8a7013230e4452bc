/**
 * Visual theme for replica states. Single source of truth for the colors and
 * icons the launch report and `crew list` use.
 */

import type { ReplicaState } from "../types.ts";
import type { ColorFn } from "./color.ts";
import { color } from "./color.ts";

const STATE_COLORS: Record<ReplicaState, ColorFn> = {
	planned: color.dim,
	launching: color.yellow,
	started: color.green,
	failed: color.red,
};

const STATE_ICONS: Record<ReplicaState, string> = {
	planned: "·",
	launching: "~",
	started: "✓",
	failed: "✗",
};

export function stateColor(state: ReplicaState): ColorFn {
	return STATE_COLORS[state];
}

export function stateIcon(state: ReplicaState): string {
	return STATE_ICONS[state];
}

/** Colored icon for a replica state. */
export function stateIconColored(state: ReplicaState): string {
	return stateColor(state)(stateIcon(state));
}
