import { errorMessage } from "../errors.ts";
import { getRuntime, runtimeNames } from "../runtimes/registry.ts";
import type { Spawner } from "../spawn.ts";
import type { DoctorCheck, DoctorCheckFn } from "./types.ts";

/**
 * External dependency checks.
 * tmux is always required; of the agent CLIs only the configured default
 * runtime's binary is, the others only warn.
 */
export const checkDependencies: DoctorCheckFn = async (ctx) => {
	const tools = [{ name: ctx.config.tmux.command, versionFlag: "-V", required: true }];
	for (const id of runtimeNames()) {
		tools.push({
			name: getRuntime(id).binary,
			versionFlag: "--version",
			required: id === ctx.config.runtime.default,
		});
	}

	const checks: DoctorCheck[] = [];
	for (const tool of tools) {
		checks.push(await checkTool(ctx.spawner, tool.name, tool.versionFlag, tool.required));
	}
	return checks;
};

/**
 * Check if a CLI tool is available by running it with a version flag.
 */
export async function checkTool(
	spawner: Spawner,
	name: string,
	versionFlag: string,
	required: boolean,
): Promise<DoctorCheck> {
	try {
		const { exitCode, stdout, stderr } = await spawner([name, versionFlag]);

		if (exitCode === 0) {
			const version = stdout.split("\n")[0]?.trim() || "version unknown";
			return {
				name: `${name} availability`,
				category: "dependencies",
				status: "pass",
				message: `${name} is available`,
				details: [version],
			};
		}

		return {
			name: `${name} availability`,
			category: "dependencies",
			status: required ? "fail" : "warn",
			message: `${name} command failed (exit code ${exitCode})`,
			details: stderr.trim() ? [stderr.trim()] : undefined,
		};
	} catch (error) {
		// Command not found or spawn failed
		return {
			name: `${name} availability`,
			category: "dependencies",
			status: required ? "fail" : "warn",
			message: `${name} is not installed or not in PATH`,
			details: [`Install ${name} or ensure it is in your PATH`, errorMessage(error)],
		};
	}
}
