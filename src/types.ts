// Shared types for agent-crew.

// === Roles ===

export const ROLE_IDS = ["epoch", "architect", "reviewer", "supervisor", "worker"] as const;

/** Functional identity of a launched agent session. */
export type Role = (typeof ROLE_IDS)[number];

// === Launch ===

/** A validated launch invocation. */
export interface LaunchRequest {
	role: Role;
	/** Number of replicas to launch (>= 1). */
	replicaCount: number;
	/** Ordered task identifiers, possibly empty. Need not match replicaCount. */
	taskIds: readonly string[];
	/** Base instruction text handed to every replica. */
	prompt: string;
}

/** Everything that will be created for one replica, computed before any side effect. */
export interface ReplicaPlan {
	/** 0-based replica ordinal. */
	readonly index: number;
	/** Multiplexer session name, unique within the run. */
	readonly sessionName: string;
	readonly assignedTasks: readonly string[];
	/** Final instruction text passed to the agent process. */
	readonly renderedPrompt: string;
}

/**
 * A replica as it comes out of planning. An "unnamed" draft could not get a
 * free session name; its plan carries the base name it tried and nothing is
 * ever created under it.
 */
export type ReplicaDraft =
	| { status: "planned"; plan: ReplicaPlan }
	| { status: "unnamed"; plan: ReplicaPlan; error: Error };

export interface LaunchPlan {
	role: Role;
	replicas: ReplicaDraft[];
}

export type LaunchResult =
	| { plan: ReplicaPlan; outcome: "started" }
	| { plan: ReplicaPlan; outcome: "failed"; errorCode: string; errorDetail: string };

export type LaunchOutcome = LaunchResult["outcome"];

/** Per-replica lifecycle: planned -> launching -> started | failed. */
export type ReplicaState = "planned" | "launching" | LaunchOutcome;

// === Models ===

/** A model reference: provider-qualified ("anthropic/claude-sonnet-4-6") or a bare alias ("sonnet"). */
export interface ModelRef {
	provider: string | null;
	model: string;
}

// === Configuration ===

export type PermissionMode = "bypass" | "ask";

export interface CrewConfig {
	runtime: {
		/** Runtime adapter used when --runtime is not passed. */
		default: string;
		/** Model ref passed to the agent when --model is not passed. */
		model?: string;
		permissionMode: PermissionMode;
	};
	sessions: {
		/** Prepended to every session name (sanitized like the rest of the name). */
		prefix: string;
		maxNameAttempts: number;
		maxNameLength: number;
	};
	launch: {
		/** Replicas launched at once. 1 = sequential. */
		concurrency: number;
		/** Minimum spacing between consecutive session starts. */
		staggerDelayMs: number;
	};
	tmux: {
		command: string;
	};
}
