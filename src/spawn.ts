import { spawn } from "node:child_process";

export interface SpawnResult {
	exitCode: number;
	stdout: string;
	stderr: string;
}

/**
 * Spawner abstraction for testability.
 * Runs an argv to completion and collects its output. Rejects only when the
 * process cannot be started at all (e.g. binary not on PATH).
 */
export type Spawner = (
	args: readonly string[],
	opts?: { cwd?: string; env?: Record<string, string> },
) => Promise<SpawnResult>;

export const defaultSpawner: Spawner = (args, opts) =>
	new Promise<SpawnResult>((resolve, reject) => {
		const [command, ...rest] = args;
		if (command === undefined) {
			reject(new Error("Cannot spawn an empty command"));
			return;
		}

		const proc = spawn(command, rest, {
			cwd: opts?.cwd,
			env: opts?.env ? { ...process.env, ...opts.env } : process.env,
			stdio: ["ignore", "pipe", "pipe"],
		});

		let stdout = "";
		let stderr = "";
		proc.stdout.setEncoding("utf8");
		proc.stderr.setEncoding("utf8");
		proc.stdout.on("data", (chunk: string) => {
			stdout += chunk;
		});
		proc.stderr.on("data", (chunk: string) => {
			stderr += chunk;
		});

		proc.on("error", reject);
		proc.on("close", (code) => {
			resolve({ exitCode: code ?? 1, stdout, stderr });
		});
	});
