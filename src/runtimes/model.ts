import { ValidationError } from "../errors.ts";
import type { ModelRef } from "../types.ts";

/**
 * Parse a --model value.
 *
 * "provider/model" splits on the first "/" only, so org-scoped model names
 * keep their slashes ("org/team/model" -> provider "org", model "team/model").
 * A value without "/" is a runtime alias ("sonnet") with no provider.
 *
 * @throws ValidationError when either side of the first "/" is empty
 */
export function parseModelRef(value: string): ModelRef {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new ValidationError("--model must not be empty", { field: "model", value });
	}

	const slash = trimmed.indexOf("/");
	if (slash === -1) {
		return { provider: null, model: trimmed };
	}

	const provider = trimmed.slice(0, slash);
	const model = trimmed.slice(slash + 1);
	if (provider.length === 0 || model.length === 0) {
		throw new ValidationError(
			`Invalid model "${value}": expected "provider/model" or a bare alias`,
			{ field: "model", value },
		);
	}
	return { provider, model };
}

/** Render a model ref back to its string form. */
export function formatModelRef(ref: ModelRef): string {
	return ref.provider === null ? ref.model : `${ref.provider}/${ref.model}`;
}

/**
 * Shared resolveModel behavior: accept bare aliases and refs from `provider`.
 */
export function resolveForProvider(ref: ModelRef, provider: string, runtimeId: string): string {
	if (ref.provider !== null && ref.provider !== provider) {
		throw new ValidationError(
			`Runtime "${runtimeId}" cannot run model "${formatModelRef(ref)}" (expected provider "${provider}")`,
			{ field: "model", value: formatModelRef(ref) },
		);
	}
	return ref.model;
}
