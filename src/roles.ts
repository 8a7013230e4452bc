import { ValidationError } from "./errors.ts";
import { ROLE_IDS, type Role } from "./types.ts";

export interface RoleDefinition {
	/** One-line summary placed under the prompt header. */
	summary: string;
	/** Roles that normally work from an assigned slice of the task list. */
	taskDriven: boolean;
}

/**
 * Exhaustive role table. Adding a role to ROLE_IDS without an entry here is a
 * type error.
 */
export const ROLE_DEFS: Record<Role, RoleDefinition> = {
	epoch: {
		summary:
			"You own the epoch lifecycle: carry the request from elicitation through plan ratification, implementation and landing.",
		taskDriven: false,
	},
	architect: {
		summary:
			"You elicit requirements and write the proposal; revise it until every reviewer votes ACCEPT.",
		taskDriven: false,
	},
	reviewer: {
		summary:
			"You review plans and code, vote ACCEPT or REVISE, and tag each finding BLOCKER, IMPORTANT or MINOR.",
		taskDriven: false,
	},
	supervisor: {
		summary:
			"You decompose the ratified plan into slices, assign them to workers and track them to completion.",
		taskDriven: true,
	},
	worker: {
		summary: "You implement the slices assigned to you and report back when each one is done.",
		taskDriven: true,
	},
};

export function isRole(value: string): value is Role {
	return ROLE_IDS.some((role) => role === value);
}

/**
 * Parse a --role value.
 *
 * @throws ValidationError when the value is not a known role
 */
export function parseRole(value: string | undefined): Role {
	if (value === undefined || value.trim().length === 0) {
		throw new ValidationError(`--role is required (one of: ${ROLE_IDS.join(", ")})`, {
			field: "role",
		});
	}
	const trimmed = value.trim();
	if (!isRole(trimmed)) {
		throw new ValidationError(`Unknown role "${trimmed}". Available: ${ROLE_IDS.join(", ")}`, {
			field: "role",
			value,
		});
	}
	return trimmed;
}
