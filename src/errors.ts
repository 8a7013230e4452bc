/**
 * Error hierarchy for agent-crew.
 *
 * Every error carries a stable `code` so the CLI can print `Error [CODE]`
 * and launch results can record why a replica failed.
 */

export class CrewError extends Error {
	readonly code: string;

	constructor(message: string, code: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CrewError";
		this.code = code;
	}
}

/** Bad request or flag value. Raised before any external call. */
export class ValidationError extends CrewError {
	readonly field: string | undefined;
	readonly value: unknown;

	constructor(message: string, context?: { field?: string; value?: unknown; cause?: unknown }) {
		super(message, "VALIDATION_ERROR", { cause: context?.cause });
		this.name = "ValidationError";
		this.field = context?.field;
		this.value = context?.value;
	}
}

/** Config file unreadable or holding an invalid value. */
export class ConfigError extends CrewError {
	readonly configPath: string | undefined;
	readonly field: string | undefined;

	constructor(message: string, context?: { configPath?: string; field?: string; cause?: unknown }) {
		super(message, "CONFIG_ERROR", { cause: context?.cause });
		this.name = "ConfigError";
		this.configPath = context?.configPath;
		this.field = context?.field;
	}
}

/** No free session name within the attempt bound. Fails one replica only. */
export class NameExhaustionError extends CrewError {
	readonly baseName: string;
	readonly attempts: number;

	constructor(message: string, context: { baseName: string; attempts: number }) {
		super(message, "NAME_EXHAUSTED");
		this.name = "NameExhaustionError";
		this.baseName = context.baseName;
		this.attempts = context.attempts;
	}
}

export type BoundaryKind = "multiplexer" | "agent";

/** A multiplexer or agent-start call failed. Fails one replica only. */
export class BoundaryError extends CrewError {
	readonly boundary: BoundaryKind;
	readonly sessionName: string | undefined;

	constructor(
		message: string,
		context: { boundary: BoundaryKind; sessionName?: string; cause?: unknown },
	) {
		super(message, "BOUNDARY_ERROR", { cause: context.cause });
		this.name = "BoundaryError";
		this.boundary = context.boundary;
		this.sessionName = context.sessionName;
	}
}

/** Render an unknown thrown value as a one-line message. */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
