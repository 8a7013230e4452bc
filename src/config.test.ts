import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CONFIG_FILENAME, CREW_DIR, DEFAULT_CONFIG, deepMerge, loadConfig } from "./config.ts";
import { ConfigError } from "./errors.ts";

describe("loadConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "crew-config-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	async function writeConfig(text: string): Promise<string> {
		await mkdir(join(dir, CREW_DIR), { recursive: true });
		const path = join(dir, CREW_DIR, CONFIG_FILENAME);
		await writeFile(path, text);
		return path;
	}

	test("defaults when no config file exists", async () => {
		expect(await loadConfig(dir)).toEqual(DEFAULT_CONFIG);
	});

	test("defaults for an empty file", async () => {
		await writeConfig("");
		expect(await loadConfig(dir)).toEqual(DEFAULT_CONFIG);
	});

	test("merges file values over the defaults", async () => {
		await writeConfig(
			[
				"runtime:",
				"  model: anthropic/sonnet",
				"sessions:",
				"  prefix: proj-",
				"launch:",
				"  concurrency: 4",
			].join("\n"),
		);
		const config = await loadConfig(dir);
		expect(config.runtime).toEqual({
			default: "claude",
			permissionMode: "bypass",
			model: "anthropic/sonnet",
		});
		expect(config.sessions.prefix).toBe("proj-");
		expect(config.sessions.maxNameAttempts).toBe(1000);
		expect(config.launch).toEqual({ concurrency: 4, staggerDelayMs: 0 });
	});

	test("does not mutate the defaults", async () => {
		await writeConfig("runtime:\n  model: sonnet\n");
		await loadConfig(dir);
		expect(DEFAULT_CONFIG.runtime.model).toBeUndefined();
	});

	test("reads an explicit path relative to cwd", async () => {
		await writeFile(join(dir, "alt.yaml"), "runtime:\n  default: codex\n");
		const config = await loadConfig(dir, "alt.yaml");
		expect(config.runtime.default).toBe("codex");
	});

	test("a missing explicit path is an error", async () => {
		await expect(loadConfig(dir, "missing.yaml")).rejects.toThrow(
			`Config file not found: ${join(dir, "missing.yaml")}`,
		);
	});

	test("rejects values out of range", async () => {
		await writeConfig("launch:\n  concurrency: 0\n");
		await expect(loadConfig(dir)).rejects.toThrow("launch.concurrency must be an integer >= 1");
	});

	test("rejects an unknown permission mode", async () => {
		await writeConfig("runtime:\n  permissionMode: yolo\n");
		await expect(loadConfig(dir)).rejects.toThrow(
			'runtime.permissionMode must be "bypass" or "ask"',
		);
	});

	test("rejects malformed YAML", async () => {
		await writeConfig("runtime: [unclosed\n");
		await expect(loadConfig(dir)).rejects.toBeInstanceOf(ConfigError);
	});

	test("rejects a document that is not a mapping", async () => {
		const path = await writeConfig("- a\n- b\n");
		await expect(loadConfig(dir)).rejects.toThrow(`${path} must contain a YAML mapping`);
	});
});

describe("deepMerge", () => {
	test("merges nested objects and replaces everything else", () => {
		expect(deepMerge({ a: { x: 1, y: 2 }, list: [1, 2] }, { a: { y: 3 }, list: [9] })).toEqual({
			a: { x: 1, y: 3 },
			list: [9],
		});
	});
});
