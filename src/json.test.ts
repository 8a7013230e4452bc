import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { jsonError, jsonOutput } from "./json.ts";
import { type CapturedOutput, captureOutput } from "./test-helpers.ts";

describe("jsonOutput", () => {
	let output: CapturedOutput;

	beforeEach(() => {
		output = captureOutput();
	});

	afterEach(() => {
		output.restore();
	});

	test("writes success envelope to stdout", () => {
		jsonOutput("list", { sessions: [] });
		expect(output.stdout()).toBe('{"success":true,"command":"list","sessions":[]}\n');
	});

	test("spreads data properties into top-level envelope", () => {
		jsonOutput("launch", { started: 2, failed: 1 });
		const parsed = JSON.parse(output.stdout());
		expect(parsed).toEqual({ success: true, command: "launch", started: 2, failed: 1 });
		expect(parsed.data).toBeUndefined();
	});
});

describe("jsonError", () => {
	let output: CapturedOutput;

	beforeEach(() => {
		output = captureOutput();
	});

	afterEach(() => {
		output.restore();
	});

	test("writes error envelope to stdout, not stderr", () => {
		jsonError("crew", "Replica count must be a positive integer");
		expect(output.stdout()).toBe(
			'{"success":false,"command":"crew","error":"Replica count must be a positive integer"}\n',
		);
		expect(output.stderr()).toBe("");
	});
});
