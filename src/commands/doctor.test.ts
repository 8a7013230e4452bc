import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { type CapturedOutput, captureOutput, createFakeSpawner } from "../test-helpers.ts";
import { doctorCommand } from "./doctor.ts";

describe("doctorCommand", () => {
	let dir: string;
	let output: CapturedOutput;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "crew-doctor-"));
		vi.spyOn(process, "cwd").mockReturnValue(dir);
		output = captureOutput();
		process.exitCode = undefined;
	});

	afterEach(async () => {
		output.restore();
		vi.restoreAllMocks();
		process.exitCode = undefined;
		await rm(dir, { recursive: true, force: true });
	});

	test("--json summarizes all checks", async () => {
		const spawner = createFakeSpawner(() => ({ stdout: "1.0.0\n" }));
		await doctorCommand({ json: true, _spawner: spawner });
		const parsed = JSON.parse(output.stdout());
		expect(parsed.summary).toEqual({ pass: 4, warn: 0, fail: 0 });
		expect(process.exitCode).toBeUndefined();
	});

	test("a missing tmux fails the run", async () => {
		const spawner = createFakeSpawner((args) =>
			args[0] === "tmux" ? new Error("spawn tmux ENOENT") : { stdout: "1.0.0\n" },
		);
		const checks = await doctorCommand({ category: "dependencies", _spawner: spawner });
		expect(checks.map((c) => c.status)).toEqual(["fail", "pass", "pass"]);
		expect(process.exitCode).toBe(1);
	});

	test("--category limits the run", async () => {
		const spawner = createFakeSpawner(() => ({}));
		const checks = await doctorCommand({ category: "config", _spawner: spawner });
		expect(checks.map((c) => c.name)).toEqual(["default runtime"]);
		expect(spawner.calls).toEqual([]);
	});

	test("rejects an unknown category", async () => {
		await expect(doctorCommand({ category: "network" })).rejects.toThrow(
			"Invalid category: network. Valid categories: dependencies, config",
		);
	});
});
