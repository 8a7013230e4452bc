/**
 * CLI command: crew launch --role <role> -n <count> --prompt <text> [--task-id <id>]...
 *
 * 1. Parse and validate flags (nothing external happens on bad input)
 * 2. Load config, resolve runtime + model
 * 3. Query existing tmux sessions for the name-collision check
 * 4. Build the launch plan (task split, session names, rendered prompts)
 * 5. --dry-run: print the plan and stop
 * 6. Check the agent binary, create each session and start the agent in it
 * 7. Report per-replica outcomes; exit 1 if any replica failed
 */

import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import { loadConfig } from "../config.ts";
import { ValidationError } from "../errors.ts";
import { jsonOutput } from "../json.ts";
import { hasFailures, launch, validateLaunchRequest } from "../launch/orchestrator.ts";
import { printError, printHint, printSuccess, printWarning } from "../logging/color.ts";
import {
	formatPlanLine,
	formatResultLine,
	formatTasks,
	nameColumnWidth,
	resultToJson,
} from "../logging/format.ts";
import { TmuxMultiplexer } from "../mux/tmux.ts";
import type { Multiplexer } from "../mux/types.ts";
import { ROLE_DEFS } from "../roles.ts";
import { parseModelRef } from "../runtimes/model.ts";
import { getRuntime, runtimeNames } from "../runtimes/registry.ts";
import { RuntimeAgentStarter } from "../runtimes/starter.ts";
import { defaultSpawner, type Spawner } from "../spawn.ts";
import type { LaunchPlan, LaunchRequest, LaunchResult } from "../types.ts";
import { ROLE_IDS } from "../types.ts";

export interface LaunchOptions {
	role?: string;
	count?: string;
	prompt?: string;
	promptFile?: string;
	taskId?: string[];
	runtime?: string;
	model?: string;
	cwd?: string;
	concurrency?: string;
	stagger?: string;
	ask?: boolean;
	dryRun?: boolean;
	json?: boolean;
	verbose?: boolean;
	/** --config path from the global options. */
	config?: string;
	/** Injected multiplexer (tests). Defaults to tmux. */
	_multiplexer?: Multiplexer;
	/** Injected process runner (tests) for tmux and the agent binary check. */
	_spawner?: Spawner;
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

/**
 * Parse a non-negative integer flag strictly: "3" is fine, "3x", "-1" and
 * "1.5" are not. Range checks are the caller's.
 */
export function parseIntegerFlag(value: string, flag: string, field: string): number {
	if (!/^\d+$/.test(value.trim())) {
		throw new ValidationError(`${flag} must be a non-negative integer`, { field, value });
	}
	return Number.parseInt(value.trim(), 10);
}

/** Resolve the base prompt from --prompt or --prompt-file (exactly one). */
export async function resolvePrompt(
	opts: Pick<LaunchOptions, "prompt" | "promptFile">,
	cwd: string,
): Promise<string> {
	if (opts.prompt !== undefined && opts.promptFile !== undefined) {
		throw new ValidationError("Pass either --prompt or --prompt-file, not both", {
			field: "prompt",
		});
	}
	if (opts.promptFile !== undefined) {
		const path = resolve(cwd, opts.promptFile);
		try {
			return await readFile(path, "utf8");
		} catch (err) {
			throw new ValidationError(`Prompt file not readable: ${opts.promptFile}`, {
				field: "promptFile",
				value: opts.promptFile,
				cause: err,
			});
		}
	}
	if (opts.prompt === undefined) {
		throw new ValidationError("--prompt (or --prompt-file) is required", { field: "prompt" });
	}
	return opts.prompt;
}

async function resolveWorkingDir(cwd: string | undefined): Promise<string> {
	const dir = resolve(cwd ?? process.cwd());
	const isDir = await stat(dir).then(
		(s) => s.isDirectory(),
		() => false,
	);
	if (!isDir) {
		throw new ValidationError(`Working directory not found: ${dir}`, { field: "cwd", value: cwd });
	}
	return dir;
}

function printPlan(request: LaunchRequest, plan: LaunchPlan, runtimeId: string): void {
	const width = nameColumnWidth(plan.replicas.map((r) => r.plan.sessionName));
	printSuccess(`Launch plan: ${request.replicaCount} × ${request.role} via ${runtimeId}`);
	for (const draft of plan.replicas) {
		process.stdout.write(`${formatPlanLine(draft, width)}\n`);
	}
}

function printReport(results: readonly LaunchResult[]): void {
	const width = nameColumnWidth(results.map((r) => r.plan.sessionName));
	for (const result of results) {
		process.stdout.write(`${formatResultLine(result, width)}\n`);
	}
	const failedCount = results.filter((r) => r.outcome === "failed").length;
	const startedCount = results.length - failedCount;
	if (failedCount === 0) {
		printSuccess(`Started ${startedCount}/${results.length} replicas`);
		printHint("Attach with: tmux attach -t <session>");
	} else {
		printError(`${startedCount}/${results.length} replicas started, ${failedCount} failed`);
	}
}

/**
 * Entry point for `crew launch`.
 * Sets process.exitCode to 1 when any replica failed; throws on invalid input.
 */
export async function launchCommand(opts: LaunchOptions): Promise<LaunchResult[]> {
	const json = opts.json ?? false;

	// 1. Flags
	if (opts.role === undefined) {
		throw new ValidationError(`--role is required (one of: ${ROLE_IDS.join(", ")})`, {
			field: "role",
		});
	}
	if (opts.count === undefined) {
		throw new ValidationError("-n <count> is required", { field: "replicaCount" });
	}
	const replicaCount = parseIntegerFlag(opts.count, "-n", "replicaCount");
	const cwd = await resolveWorkingDir(opts.cwd);
	const prompt = await resolvePrompt(opts, cwd);

	const request = validateLaunchRequest({
		role: opts.role,
		replicaCount,
		taskIds: opts.taskId ?? [],
		prompt,
	});

	// 2. Config, runtime, model
	const config = await loadConfig(cwd, opts.config);
	const runtime = getRuntime(opts.runtime, config);
	const modelValue = opts.model ?? config.runtime.model;
	const model =
		modelValue !== undefined ? runtime.resolveModel(parseModelRef(modelValue)) : undefined;
	const concurrency =
		opts.concurrency !== undefined
			? parseIntegerFlag(opts.concurrency, "--concurrency", "concurrency")
			: config.launch.concurrency;
	if (concurrency < 1) {
		throw new ValidationError("--concurrency must be at least 1", {
			field: "concurrency",
			value: opts.concurrency,
		});
	}
	const staggerDelayMs =
		opts.stagger !== undefined
			? parseIntegerFlag(opts.stagger, "--stagger", "staggerDelayMs")
			: config.launch.staggerDelayMs;

	if (request.taskIds.length > 0 && !ROLE_DEFS[request.role].taskDriven) {
		printWarning(
			`Assigning task ids to ${request.role} replicas`,
			"this role normally works from its role instructions alone",
		);
	}

	// 3-6. Plan, then (unless --dry-run) create sessions and start agents
	const spawner = opts._spawner ?? defaultSpawner;
	const multiplexer =
		opts._multiplexer ?? new TmuxMultiplexer({ command: config.tmux.command, spawner });
	const agent = new RuntimeAgentStarter(
		multiplexer,
		runtime,
		{ model, permissionMode: opts.ask ? "ask" : config.runtime.permissionMode },
		spawner,
	);
	const dryRun = opts.dryRun ?? false;
	const { plan, results } = await launch(request, {
		multiplexer,
		agent,
		cwd,
		concurrency,
		staggerDelayMs,
		dryRun,
		naming: {
			prefix: config.sessions.prefix,
			maxAttempts: config.sessions.maxNameAttempts,
			maxLength: config.sessions.maxNameLength,
		},
		onWarning: (msg) => printWarning(msg),
		onStateChange: (replica, state, detail) => {
			if (!opts.verbose || json) return;
			const suffix = detail ? `: ${detail}` : "";
			process.stderr.write(
				`  ${state.padEnd(9)} ${replica.sessionName} (tasks: ${formatTasks(replica.assignedTasks)})${suffix}\n`,
			);
		},
	});

	if (dryRun) {
		if (json) {
			jsonOutput("launch", {
				dryRun: true,
				role: request.role,
				runtime: runtime.id,
				replicas: plan.replicas.map((draft) => ({
					index: draft.plan.index,
					sessionName: draft.plan.sessionName,
					assignedTasks: [...draft.plan.assignedTasks],
					renderedPrompt: draft.plan.renderedPrompt,
					...(draft.status === "unnamed" ? { error: draft.error.message } : {}),
				})),
			});
		} else {
			printPlan(request, plan, runtime.id);
		}
		if (plan.replicas.some((r) => r.status === "unnamed")) process.exitCode = 1;
		return [];
	}

	// 7. Report
	if (json) {
		jsonOutput("launch", {
			role: request.role,
			runtime: runtime.id,
			started: results.filter((r) => r.outcome === "started").length,
			failed: results.filter((r) => r.outcome === "failed").length,
			replicas: results.map(resultToJson),
		});
	} else {
		printReport(results);
	}

	if (hasFailures(results)) {
		process.exitCode = 1;
	}
	return results;
}

export function createLaunchCommand(): Command {
	return new Command("launch")
		.description("Launch N replicas of a role, each in its own tmux session")
		.option("--role <role>", `Agent role: ${ROLE_IDS.join(" | ")}`)
		.option("-n, --count <n>", "Number of replicas to launch")
		.option("--prompt <text>", "Base instruction prompt")
		.option("--prompt-file <path>", "Read the base prompt from a file")
		.option("--task-id <id>", "Task id to distribute (repeatable, kept in order)", collect, [])
		.option(
			"--runtime <name>",
			`Agent runtime: ${runtimeNames().join(" | ")} (default: config or claude)`,
		)
		.option("--model <ref>", "Model alias or provider/model")
		.option("--cwd <dir>", "Working directory for the sessions (default: current)")
		.option("--concurrency <n>", "Replicas launched at once (default: config or 1)")
		.option("--stagger <ms>", "Minimum delay between session starts (default: config or 0)")
		.option("--ask", "Start agents with the runtime's default approval prompts")
		.option("--dry-run", "Print the launch plan without creating sessions")
		.option("--json", "Output result as JSON")
		.action(async (opts: LaunchOptions, cmd: Command) => {
			const globals = cmd.optsWithGlobals<{ config?: string; verbose?: boolean }>();
			await launchCommand({ ...opts, config: globals.config, verbose: globals.verbose });
		});
}
