import { afterEach, describe, expect, test } from "vitest";
import { captureOutput } from "../test-helpers.ts";
import {
	color,
	isQuiet,
	printError,
	printHint,
	printSuccess,
	printWarning,
	setQuiet,
	stripAnsi,
} from "./color.ts";

describe("color module", () => {
	test("color functions keep the wrapped text", () => {
		expect(stripAnsi(color.red("hello"))).toBe("hello");
		expect(stripAnsi(color.bold(color.green("ok")))).toBe("ok");
	});

	test("stripAnsi removes escape codes", () => {
		expect(stripAnsi("\x1b[31mhello\x1b[39m")).toBe("hello");
		expect(stripAnsi("\x1b[38;2;70;100;180mcrew\x1b[39m")).toBe("crew");
		expect(stripAnsi("plain")).toBe("plain");
	});
});

describe("message printers", () => {
	afterEach(() => {
		setQuiet(false);
	});

	test("printSuccess goes to stdout with an optional id", () => {
		const output = captureOutput();
		try {
			printSuccess("Stopped", "worker-0");
		} finally {
			output.restore();
		}
		expect(stripAnsi(output.stdout())).toBe("✓ Stopped worker-0\n");
		expect(output.stderr()).toBe("");
	});

	test("printWarning goes to stderr so JSON stdout stays clean", () => {
		const output = captureOutput();
		try {
			printWarning("Could not list existing sessions", "continuing");
		} finally {
			output.restore();
		}
		expect(output.stdout()).toBe("");
		expect(stripAnsi(output.stderr())).toBe("! Could not list existing sessions — continuing\n");
	});

	test("quiet mode silences everything but errors", () => {
		setQuiet(true);
		expect(isQuiet()).toBe(true);
		const output = captureOutput();
		try {
			printSuccess("done");
			printWarning("careful");
			printHint("tip");
			printError("broken");
		} finally {
			output.restore();
		}
		expect(output.stdout()).toBe("");
		expect(stripAnsi(output.stderr())).toBe("✗ broken\n");
	});
});
