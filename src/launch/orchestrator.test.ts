import { describe, expect, test, vi } from "vitest";
import { BoundaryError, ValidationError } from "../errors.ts";
import type { AgentStarter } from "../runtimes/types.ts";
import { FakeMultiplexer } from "../test-helpers.ts";
import type { ReplicaState } from "../types.ts";
import { SessionNameRegistry } from "./namer.ts";
import {
	buildSessionEnv,
	executePlan,
	hasFailures,
	launch,
	planLaunch,
	validateLaunchRequest,
} from "./orchestrator.ts";
import { renderPrompt } from "./prompt.ts";

class RecordingAgent implements AgentStarter {
	readonly started: Array<{ sessionName: string; instruction: string }> = [];
	checks = 0;

	constructor(private readonly unavailable?: Error) {}

	async checkAvailable(): Promise<void> {
		this.checks++;
		if (this.unavailable) throw this.unavailable;
	}

	async startAgent(sessionName: string, instruction: string): Promise<void> {
		this.started.push({ sessionName, instruction });
	}
}

const noSleep = async (_ms: number): Promise<void> => {};

const workerRequest = validateLaunchRequest({
	role: "worker",
	replicaCount: 3,
	taskIds: ["a", "b", "c", "d", "e"],
	prompt: "Implement the slices.",
});

describe("validateLaunchRequest", () => {
	test("accepts a well-formed request", () => {
		expect(workerRequest).toEqual({
			role: "worker",
			replicaCount: 3,
			taskIds: ["a", "b", "c", "d", "e"],
			prompt: "Implement the slices.",
		});
	});

	test("rejects bad input before anything else happens", () => {
		const base = { role: "worker", replicaCount: 1, taskIds: [], prompt: "p" };
		expect(() => validateLaunchRequest({ ...base, role: "builder" })).toThrow(
			'Unknown role "builder". Available: epoch, architect, reviewer, supervisor, worker',
		);
		expect(() => validateLaunchRequest({ ...base, replicaCount: 0 })).toThrow(
			"Replica count must be a positive integer",
		);
		expect(() => validateLaunchRequest({ ...base, prompt: "  \n " })).toThrow(
			"Prompt must not be empty",
		);
		expect(() => validateLaunchRequest({ ...base, taskIds: ["a", " "] })).toThrow(
			"Task id at position 2 is empty",
		);
	});
});

describe("planLaunch", () => {
	test("distributes tasks, names sessions and renders prompts", () => {
		const plan = planLaunch(workerRequest, new SessionNameRegistry());
		const replicas = plan.replicas.map((r) => r.plan);
		expect(replicas.map((r) => r.sessionName)).toEqual(["worker-0", "worker-1", "worker-2"]);
		expect(replicas.map((r) => r.assignedTasks)).toEqual([["a", "d"], ["b", "e"], ["c"]]);
		expect(replicas[2]?.renderedPrompt).toBe(renderPrompt("worker", "Implement the slices.", ["c"]));
		expect(replicas.every((r) => Object.isFrozen(r))).toBe(true);
	});

	test("steps around live sessions", () => {
		const plan = planLaunch(workerRequest, new SessionNameRegistry(["worker-1"]));
		expect(plan.replicas.map((r) => r.plan.sessionName)).toEqual([
			"worker-0",
			"worker-1-1",
			"worker-2",
		]);
	});

	test("name exhaustion marks only that replica unnamed", () => {
		const plan = planLaunch(workerRequest, new SessionNameRegistry(["worker-0"]), {
			maxAttempts: 0,
		});
		expect(plan.replicas.map((r) => r.status)).toEqual(["unnamed", "planned", "planned"]);
		expect(plan.replicas[0]?.plan.sessionName).toBe("worker-0");
	});
});

describe("buildSessionEnv", () => {
	test("exposes role, session, replica index and tasks", () => {
		const plan = { index: 1, sessionName: "worker-1", assignedTasks: ["b", "e"], renderedPrompt: "" };
		expect(buildSessionEnv("worker", plan)).toEqual({
			CREW_ROLE: "worker",
			CREW_SESSION: "worker-1",
			CREW_REPLICA: "1",
			CREW_TASKS: "b,e",
		});
	});
});

describe("executePlan", () => {
	test("creates each session then starts its agent", async () => {
		const mux = new FakeMultiplexer();
		const agent = new RecordingAgent();
		const plan = planLaunch(workerRequest, new SessionNameRegistry());

		const results = await executePlan(plan, { multiplexer: mux, agent, cwd: "/work", sleep: noSleep });

		expect(results.map((r) => r.outcome)).toEqual(["started", "started", "started"]);
		const creates = mux.callsOf("createSession");
		expect(creates.map((c) => c.name)).toEqual(["worker-0", "worker-1", "worker-2"]);
		expect(creates[0]?.opts).toEqual({
			cwd: "/work",
			env: { CREW_ROLE: "worker", CREW_SESSION: "worker-0", CREW_REPLICA: "0", CREW_TASKS: "a,d" },
		});
		expect(agent.started.map((s) => s.sessionName)).toEqual(["worker-0", "worker-1", "worker-2"]);
		expect(agent.started[0]?.instruction).toBe(plan.replicas[0]?.plan.renderedPrompt);
		expect(hasFailures(results)).toBe(false);
	});

	test("one failed session does not stop its siblings", async () => {
		const mux = new FakeMultiplexer({ failCreate: ["worker-1"] });
		const agent = new RecordingAgent();
		const plan = planLaunch(workerRequest, new SessionNameRegistry());

		const results = await executePlan(plan, {
			multiplexer: mux,
			agent,
			cwd: "/work",
			concurrency: 3,
			sleep: noSleep,
		});

		expect(results.map((r) => r.outcome)).toEqual(["started", "failed", "started"]);
		const failed = results[1];
		expect(failed?.outcome === "failed" && failed.errorCode).toBe("BOUNDARY_ERROR");
		expect(failed?.outcome === "failed" && failed.errorDetail).toBe(
			"duplicate or refused session: worker-1",
		);
		expect(agent.started.map((s) => s.sessionName)).toEqual(["worker-0", "worker-2"]);
		expect(hasFailures(results)).toBe(true);
	});

	test("an unavailable agent fails every replica before any session exists", async () => {
		const mux = new FakeMultiplexer();
		const agent = new RecordingAgent(
			new BoundaryError('Agent binary "claude" not found: spawn claude ENOENT', {
				boundary: "agent",
			}),
		);
		const plan = planLaunch(workerRequest, new SessionNameRegistry());

		const results = await executePlan(plan, { multiplexer: mux, agent, cwd: "/work", sleep: noSleep });

		expect(results.map((r) => r.outcome)).toEqual(["failed", "failed", "failed"]);
		const first = results[0];
		expect(first?.outcome === "failed" && first.errorDetail).toBe(
			'Agent binary "claude" not found: spawn claude ENOENT',
		);
		expect(mux.callsOf("createSession")).toEqual([]);
		expect(agent.started).toEqual([]);
	});

	test("an unnamed replica fails without touching the multiplexer", async () => {
		const mux = new FakeMultiplexer();
		const plan = planLaunch(workerRequest, new SessionNameRegistry(["worker-0"]), {
			maxAttempts: 0,
		});

		const results = await executePlan(plan, {
			multiplexer: mux,
			agent: new RecordingAgent(),
			cwd: "/work",
			sleep: noSleep,
		});

		const first = results[0];
		expect(first?.outcome === "failed" && first.errorCode).toBe("NAME_EXHAUSTED");
		expect(mux.callsOf("createSession").map((c) => c.name)).toEqual(["worker-1", "worker-2"]);
	});

	test("reports state transitions in order", async () => {
		const request = validateLaunchRequest({
			role: "epoch",
			replicaCount: 1,
			taskIds: [],
			prompt: "Run the epoch.",
		});
		const plan = planLaunch(request, new SessionNameRegistry());
		const states: ReplicaState[] = [];

		await executePlan(plan, {
			multiplexer: new FakeMultiplexer(),
			agent: new RecordingAgent(),
			cwd: "/work",
			sleep: noSleep,
			onStateChange: (_plan, state) => states.push(state),
		});

		expect(states).toEqual(["planned", "launching", "started"]);
	});

	test("spaces session starts by the stagger delay", async () => {
		const sleep = vi.fn(noSleep);
		const plan = planLaunch(workerRequest, new SessionNameRegistry());

		await executePlan(plan, {
			multiplexer: new FakeMultiplexer(),
			agent: new RecordingAgent(),
			cwd: "/work",
			staggerDelayMs: 100,
			sleep,
			clock: () => 1000,
		});

		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
	});
});

describe("launch", () => {
	test("invalid input makes no boundary call", async () => {
		const mux = new FakeMultiplexer();
		await expect(
			launch(
				{ role: "worker", replicaCount: 0, taskIds: [], prompt: "p" },
				{ multiplexer: mux, agent: new RecordingAgent(), cwd: "/work" },
			),
		).rejects.toBeInstanceOf(ValidationError);
		expect(mux.calls).toEqual([]);
	});

	test("names that cannot fit the length bound are rejected before any boundary call", async () => {
		const mux = new FakeMultiplexer();
		await expect(
			launch(
				{ role: "supervisor", replicaCount: 12, taskIds: [], prompt: "p" },
				{
					multiplexer: mux,
					agent: new RecordingAgent(),
					cwd: "/work",
					naming: { maxAttempts: 9, maxLength: 14 },
				},
			),
		).rejects.toThrow(
			'Session names need up to 15 characters ("supervisor-11-9") but sessions.maxNameLength is 14',
		);
		expect(mux.calls).toEqual([]);
	});

	test("a dry run plans without creating sessions", async () => {
		const mux = new FakeMultiplexer({ existing: ["worker-0"] });
		const agent = new RecordingAgent();

		const { plan, results } = await launch(
			{ role: "worker", replicaCount: 2, taskIds: ["a"], prompt: "Go." },
			{ multiplexer: mux, agent, cwd: "/work", dryRun: true },
		);

		expect(plan.replicas.map((r) => r.plan.sessionName)).toEqual(["worker-0-1", "worker-1"]);
		expect(results).toEqual([]);
		expect(mux.calls).toEqual([{ method: "listSessionNames" }]);
		expect(agent.checks).toBe(0);
	});

	test("a failing session listing warns and the launch proceeds", async () => {
		const mux = new FakeMultiplexer({ failList: true });
		const warnings: string[] = [];

		const { results } = await launch(
			{ role: "reviewer", replicaCount: 2, taskIds: [], prompt: "Review." },
			{
				multiplexer: mux,
				agent: new RecordingAgent(),
				cwd: "/work",
				sleep: noSleep,
				onWarning: (msg) => warnings.push(msg),
			},
		);

		expect(warnings).toEqual(["Could not list existing sessions: server unreachable"]);
		expect(results.map((r) => r.outcome)).toEqual(["started", "started"]);
	});
});
