import { describe, expect, test } from "vitest";
import { ValidationError } from "./errors.ts";
import { isRole, parseRole, ROLE_DEFS } from "./roles.ts";
import { ROLE_IDS } from "./types.ts";

describe("roles", () => {
	test("every role has a summary", () => {
		for (const role of ROLE_IDS) {
			expect(ROLE_DEFS[role].summary.length).toBeGreaterThan(0);
		}
	});

	test("only supervisor and worker are task driven", () => {
		const taskDriven = ROLE_IDS.filter((role) => ROLE_DEFS[role].taskDriven);
		expect(taskDriven).toEqual(["supervisor", "worker"]);
	});

	test("isRole accepts exactly the known roles", () => {
		expect(isRole("reviewer")).toBe(true);
		expect(isRole("Reviewer")).toBe(false);
		expect(isRole("builder")).toBe(false);
	});

	test("parseRole trims and rejects unknown values", () => {
		expect(parseRole(" worker ")).toBe("worker");
		expect(() => parseRole("builder")).toThrow(
			'Unknown role "builder". Available: epoch, architect, reviewer, supervisor, worker',
		);
		expect(() => parseRole(undefined)).toThrow(ValidationError);
	});
});
