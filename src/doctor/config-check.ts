import { errorMessage } from "../errors.ts";
import { parseModelRef } from "../runtimes/model.ts";
import { getRuntime } from "../runtimes/registry.ts";
import type { DoctorCheck, DoctorCheckFn } from "./types.ts";

/**
 * Configuration checks: the default runtime exists and the configured model
 * (if any) is one that runtime can run. The file itself was already loaded
 * and validated before checks run.
 */
export const checkConfig: DoctorCheckFn = async (ctx) => {
	const checks: DoctorCheck[] = [];

	let runtimeId: string | null = null;
	try {
		const runtime = getRuntime(undefined, ctx.config);
		runtimeId = runtime.id;
		checks.push({
			name: "default runtime",
			category: "config",
			status: "pass",
			message: `Default runtime is ${runtime.id}`,
		});

		const model = ctx.config.runtime.model;
		if (model !== undefined) {
			const resolved = runtime.resolveModel(parseModelRef(model));
			checks.push({
				name: "default model",
				category: "config",
				status: "pass",
				message: `Default model ${resolved} runs on ${runtime.id}`,
			});
		}
	} catch (err) {
		checks.push({
			name: runtimeId === null ? "default runtime" : "default model",
			category: "config",
			status: "fail",
			message: errorMessage(err),
			details: ctx.configPath ? [`Config: ${ctx.configPath}`] : undefined,
		});
	}

	return checks;
};
