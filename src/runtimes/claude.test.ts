import { describe, expect, test } from "vitest";
import { ValidationError } from "../errors.ts";
import { ClaudeRuntime } from "./claude.ts";

describe("ClaudeRuntime", () => {
	const runtime = new ClaudeRuntime();

	test("id, binary and provider", () => {
		expect(runtime.id).toBe("claude");
		expect(runtime.binary).toBe("claude");
		expect(runtime.provider).toBe("anthropic");
	});

	test("bypass mode skips permission prompts", () => {
		expect(runtime.buildStartCommand({ prompt: "Do it", permissionMode: "bypass" })).toBe(
			"claude --permission-mode bypassPermissions 'Do it'",
		);
	});

	test("ask mode with a model", () => {
		expect(
			runtime.buildStartCommand({ prompt: "Do it", model: "sonnet", permissionMode: "ask" }),
		).toBe("claude --model sonnet --permission-mode default 'Do it'");
	});

	test("quotes single quotes and newlines for the shell", () => {
		expect(runtime.buildStartCommand({ prompt: "it's\nfine", permissionMode: "bypass" })).toBe(
			"claude --permission-mode bypassPermissions 'it'\\''s\nfine'",
		);
	});

	test("resolveModel accepts aliases and anthropic refs only", () => {
		expect(runtime.resolveModel({ provider: null, model: "opus" })).toBe("opus");
		expect(runtime.resolveModel({ provider: "anthropic", model: "claude-sonnet" })).toBe(
			"claude-sonnet",
		);
		expect(() => runtime.resolveModel({ provider: "openai", model: "gpt-5" })).toThrow(
			'Runtime "claude" cannot run model "openai/gpt-5" (expected provider "anthropic")',
		);
		expect(() => runtime.resolveModel({ provider: "openai", model: "gpt-5" })).toThrow(
			ValidationError,
		);
	});
});
