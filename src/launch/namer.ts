/**
 * Session naming: unique, tmux-safe names of the form `{prefix}{role}-{index}`,
 * with a numeric suffix on collision (`worker-2-1`, `worker-2-2`, ...).
 */

import { NameExhaustionError, ValidationError } from "../errors.ts";
import { isRole } from "../roles.ts";
import type { Role } from "../types.ts";

export const DEFAULT_MAX_NAME_ATTEMPTS = 1000;
export const DEFAULT_MAX_NAME_LENGTH = 64;

/**
 * Names already taken in this invocation: the sessions the multiplexer
 * reported at startup plus every name issued since. Build one per run.
 */
export class SessionNameRegistry {
	private readonly taken: Set<string>;
	private readonly issuedNames: string[] = [];

	constructor(existing: Iterable<string> = []) {
		this.taken = new Set(existing);
	}

	has(name: string): boolean {
		return this.taken.has(name);
	}

	/**
	 * Claim a name. Returns false (and claims nothing) if it is already taken.
	 * Check and insert happen in one synchronous step.
	 */
	claim(name: string): boolean {
		if (this.taken.has(name)) return false;
		this.taken.add(name);
		this.issuedNames.push(name);
		return true;
	}

	/** Names issued in this run, in issue order. */
	issued(): readonly string[] {
		return this.issuedNames;
	}
}

export interface NameOptions {
	prefix?: string;
	maxAttempts?: number;
	maxLength?: number;
}

// tmux rejects "." and ":" in session names; keep to a conservative charset.
const UNSAFE_CHARS = /[^A-Za-z0-9_-]/g;

/** Replace every character outside [A-Za-z0-9_-] with "_". */
export function sanitizeSessionName(raw: string): string {
	return raw.replace(UNSAFE_CHARS, "_");
}

/**
 * The longest name a launch of `replicaCount` replicas of `role` could be
 * issued: the highest index with the highest suffix.
 */
export function longestSessionName(
	role: Role,
	replicaCount: number,
	options: NameOptions = {},
): string {
	const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_NAME_ATTEMPTS;
	const base = sanitizeSessionName(`${options.prefix ?? ""}${role}-${replicaCount - 1}`);
	return maxAttempts > 0 ? `${base}-${maxAttempts}` : base;
}

/**
 * Names are never truncated: every issued name parses back through
 * parseSessionName. A launch whose longest possible name exceeds maxLength
 * is rejected before anything runs.
 *
 * @throws ValidationError naming the longest name and the bound
 */
export function assertNamesFit(role: Role, replicaCount: number, options: NameOptions = {}): void {
	const maxLength = options.maxLength ?? DEFAULT_MAX_NAME_LENGTH;
	const longest = longestSessionName(role, replicaCount, options);
	if (longest.length > maxLength) {
		throw new ValidationError(
			`Session names need up to ${longest.length} characters ("${longest}") but sessions.maxNameLength is ${maxLength}`,
			{ field: "sessions.maxNameLength", value: maxLength },
		);
	}
}

/**
 * Pick and claim a unique session name for replica `index` of `role`.
 * Candidates longer than maxLength are never issued.
 *
 * @throws NameExhaustionError when the base name and maxAttempts suffixed
 *   candidates are all taken or too long
 */
export function nameSession(
	role: Role,
	index: number,
	registry: SessionNameRegistry,
	options: NameOptions = {},
): string {
	const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_NAME_ATTEMPTS;
	const maxLength = options.maxLength ?? DEFAULT_MAX_NAME_LENGTH;
	const base = sanitizeSessionName(`${options.prefix ?? ""}${role}-${index}`);

	if (base.length <= maxLength && registry.claim(base)) return base;

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		const candidate = `${base}-${attempt}`;
		// Suffixes only grow from here.
		if (candidate.length > maxLength) break;
		if (registry.claim(candidate)) return candidate;
	}

	throw new NameExhaustionError(
		`No free session name for "${base}" within ${maxAttempts} suffix attempts and ${maxLength} characters`,
		{ baseName: base, attempts: maxAttempts },
	);
}

export interface ParsedSessionName {
	role: Role;
	index: number;
	/** Collision suffix, or null for the base name. */
	suffix: number | null;
}

const CREW_NAME = /^([a-z]+)-(\d+)(?:-(\d+))?$/;

/**
 * Recognize a crew session name. Returns null for anything else, including
 * names that do not start with the configured prefix.
 */
export function parseSessionName(name: string, prefix = ""): ParsedSessionName | null {
	const safePrefix = sanitizeSessionName(prefix);
	if (!name.startsWith(safePrefix)) return null;
	const match = name.slice(safePrefix.length).match(CREW_NAME);
	if (!match) return null;
	const [, role, index, suffix] = match;
	if (role === undefined || index === undefined || !isRole(role)) return null;
	return {
		role,
		index: Number.parseInt(index, 10),
		suffix: suffix !== undefined ? Number.parseInt(suffix, 10) : null,
	};
}
