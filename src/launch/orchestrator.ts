/**
 * Launch orchestration: validate a request, plan every replica, then realize
 * each plan through the multiplexer and agent boundaries.
 *
 * 1. Validate (fails fast, before any external call)
 * 2. Query existing session names for the collision check
 * 3. Distribute tasks once
 * 4. Per replica, in index order: name, render, freeze the plan
 * 5. Per replica, with bounded parallelism: check the agent binary (once per
 *    run), create session, start agent
 * 6. Return one LaunchResult per replica, in replica order
 *
 * A replica's failure is recorded in its result and never aborts siblings.
 */

import { setTimeout as delay } from "node:timers/promises";
import { CrewError, errorMessage, NameExhaustionError, ValidationError } from "../errors.ts";
import type { Multiplexer } from "../mux/types.ts";
import { isRole } from "../roles.ts";
import type { AgentStarter } from "../runtimes/types.ts";
import type {
	LaunchPlan,
	LaunchRequest,
	LaunchResult,
	ReplicaDraft,
	ReplicaPlan,
	ReplicaState,
	Role,
} from "../types.ts";
import { ROLE_IDS } from "../types.ts";
import { distributeTasks } from "./distribute.ts";
import {
	assertNamesFit,
	type NameOptions,
	nameSession,
	SessionNameRegistry,
} from "./namer.ts";
import { createStaggerGate, mapWithConcurrency, type Sleep } from "./pool.ts";
import { renderPrompt } from "./prompt.ts";

/** Raw request shape as it arrives from the CLI layer, before validation. */
export interface LaunchInput {
	role: string;
	replicaCount: number;
	taskIds: readonly string[];
	prompt: string;
}

/**
 * Validate a launch request.
 *
 * @throws ValidationError on an unknown role, a replica count below 1 or not
 *   an integer, an empty prompt, or an empty task id
 */
export function validateLaunchRequest(input: LaunchInput): LaunchRequest {
	const { role, replicaCount, taskIds, prompt } = input;

	if (!isRole(role)) {
		throw new ValidationError(`Unknown role "${role}". Available: ${ROLE_IDS.join(", ")}`, {
			field: "role",
			value: role,
		});
	}
	if (!Number.isInteger(replicaCount) || replicaCount < 1) {
		throw new ValidationError("Replica count must be a positive integer", {
			field: "replicaCount",
			value: replicaCount,
		});
	}
	if (prompt.trim().length === 0) {
		throw new ValidationError("Prompt must not be empty", { field: "prompt" });
	}
	const blank = taskIds.findIndex((id) => id.trim().length === 0);
	if (blank !== -1) {
		throw new ValidationError(`Task id at position ${blank + 1} is empty`, {
			field: "taskIds",
			value: taskIds[blank],
		});
	}

	return { role, replicaCount, taskIds: [...taskIds], prompt };
}

/**
 * Compute the launch plan. Pure apart from claiming names in `registry`.
 * A replica whose name cannot be found becomes an "unnamed" draft; the
 * others are unaffected.
 */
export function planLaunch(
	request: LaunchRequest,
	registry: SessionNameRegistry,
	naming: NameOptions = {},
): LaunchPlan {
	const assignment = distributeTasks(request.taskIds, request.replicaCount);

	const replicas = assignment.map((assignedTasks, index): ReplicaDraft => {
		const renderedPrompt = renderPrompt(request.role, request.prompt, assignedTasks);
		try {
			const sessionName = nameSession(request.role, index, registry, naming);
			return {
				status: "planned",
				plan: Object.freeze({ index, sessionName, assignedTasks, renderedPrompt }),
			};
		} catch (err) {
			if (!(err instanceof NameExhaustionError)) throw err;
			return {
				status: "unnamed",
				plan: Object.freeze({ index, sessionName: err.baseName, assignedTasks, renderedPrompt }),
				error: err,
			};
		}
	});

	return { role: request.role, replicas };
}

export interface ExecuteDeps {
	multiplexer: Multiplexer;
	agent: AgentStarter;
	/** Working directory for every created session. */
	cwd: string;
	/** Replicas realized at once. Defaults to 1 (sequential). */
	concurrency?: number;
	/** Minimum spacing between consecutive session starts. */
	staggerDelayMs?: number;
	onStateChange?: (plan: ReplicaPlan, state: ReplicaState, detail?: string) => void;
	sleep?: Sleep;
	clock?: () => number;
}

/** Environment set inside each replica's session. */
export function buildSessionEnv(role: Role, plan: ReplicaPlan): Record<string, string> {
	return {
		CREW_ROLE: role,
		CREW_SESSION: plan.sessionName,
		CREW_REPLICA: String(plan.index),
		CREW_TASKS: plan.assignedTasks.join(","),
	};
}

function failed(plan: ReplicaPlan, err: unknown): LaunchResult {
	return {
		plan,
		outcome: "failed",
		errorCode: err instanceof CrewError ? err.code : "BOUNDARY_ERROR",
		errorDetail: errorMessage(err),
	};
}

/**
 * Realize a launch plan. Never rejects because of a replica failure: every
 * boundary error lands in that replica's result.
 */
export async function executePlan(plan: LaunchPlan, deps: ExecuteDeps): Promise<LaunchResult[]> {
	const sleep = deps.sleep ?? ((ms: number) => delay(ms));
	const gate = createStaggerGate(deps.staggerDelayMs ?? 0, sleep, deps.clock);
	const notify = deps.onStateChange ?? (() => {});

	for (const draft of plan.replicas) {
		notify(draft.plan, "planned");
	}

	const realize = async (draft: ReplicaDraft): Promise<LaunchResult> => {
		const replica = draft.plan;
		if (draft.status === "unnamed") {
			const result = failed(replica, draft.error);
			notify(replica, "failed", errorMessage(draft.error));
			return result;
		}

		await gate();
		notify(replica, "launching");
		try {
			await deps.agent.checkAvailable();
			await deps.multiplexer.createSession(replica.sessionName, {
				cwd: deps.cwd,
				env: buildSessionEnv(plan.role, replica),
			});
			await deps.agent.startAgent(replica.sessionName, replica.renderedPrompt);
		} catch (err) {
			const result = failed(replica, err);
			notify(replica, "failed", errorMessage(err));
			return result;
		}
		notify(replica, "started");
		return { plan: replica, outcome: "started" };
	};

	return mapWithConcurrency(plan.replicas, deps.concurrency ?? 1, realize);
}

export interface LaunchDeps extends ExecuteDeps {
	naming?: NameOptions;
	/** Called when the existing-session query fails; the launch proceeds without it. */
	onWarning?: (message: string) => void;
	/** Stop after planning: no session is created and no agent started. */
	dryRun?: boolean;
}

export interface LaunchRun {
	plan: LaunchPlan;
	/** One per replica in replica order; empty for a dry run. */
	results: LaunchResult[];
}

/**
 * Query the multiplexer for live session names. A failing query is reported
 * and treated as "nothing running": per-replica calls surface the real error.
 */
export async function existingSessionNames(
	multiplexer: Multiplexer,
	onWarning?: (message: string) => void,
): Promise<Set<string>> {
	try {
		return await multiplexer.listSessionNames();
	} catch (err) {
		onWarning?.(`Could not list existing sessions: ${errorMessage(err)}`);
		return new Set();
	}
}

/**
 * Validate, plan and execute a launch in one call.
 *
 * @throws ValidationError before any external call when the input is invalid
 *   or the session names could not fit the length bound
 */
export async function launch(input: LaunchInput, deps: LaunchDeps): Promise<LaunchRun> {
	const request = validateLaunchRequest(input);
	assertNamesFit(request.role, request.replicaCount, deps.naming);

	const existing = await existingSessionNames(deps.multiplexer, deps.onWarning);
	const plan = planLaunch(request, new SessionNameRegistry(existing), deps.naming);
	if (deps.dryRun) {
		return { plan, results: [] };
	}
	return { plan, results: await executePlan(plan, deps) };
}

/** True when at least one replica failed. */
export function hasFailures(results: readonly LaunchResult[]): boolean {
	return results.some((r) => r.outcome === "failed");
}
