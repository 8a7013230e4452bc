/**
 * In-process stand-ins for the tmux and child-process boundaries.
 * Tests never reach a real tmux server.
 */

import { vi } from "vitest";
import { BoundaryError } from "./errors.ts";
import type { CreateSessionOpts, Multiplexer } from "./mux/types.ts";
import type { SpawnResult, Spawner } from "./spawn.ts";

export type MuxCall =
	| { method: "createSession"; name: string; opts: CreateSessionOpts }
	| { method: "sendCommand"; name: string; text: string }
	| { method: "listSessionNames" }
	| { method: "killSession"; name: string };

export interface FakeMultiplexerOptions {
	/** Sessions that already exist before the run. */
	existing?: Iterable<string>;
	/** createSession rejects for these names. */
	failCreate?: Iterable<string>;
	/** sendCommand rejects for these names. */
	failSend?: Iterable<string>;
	/** killSession rejects for these names. */
	failKill?: Iterable<string>;
	/** listSessionNames rejects. */
	failList?: boolean;
}

/** Records every call and keeps a live session set like tmux would. */
export class FakeMultiplexer implements Multiplexer {
	readonly calls: MuxCall[] = [];
	readonly sessions: Set<string>;
	private readonly failCreate: Set<string>;
	private readonly failSend: Set<string>;
	private readonly failKill: Set<string>;
	private readonly failList: boolean;

	constructor(opts: FakeMultiplexerOptions = {}) {
		this.sessions = new Set(opts.existing ?? []);
		this.failCreate = new Set(opts.failCreate ?? []);
		this.failSend = new Set(opts.failSend ?? []);
		this.failKill = new Set(opts.failKill ?? []);
		this.failList = opts.failList ?? false;
	}

	async createSession(name: string, opts: CreateSessionOpts): Promise<void> {
		this.calls.push({ method: "createSession", name, opts });
		if (this.failCreate.has(name) || this.sessions.has(name)) {
			throw new BoundaryError(`duplicate or refused session: ${name}`, {
				boundary: "multiplexer",
				sessionName: name,
			});
		}
		this.sessions.add(name);
	}

	async sendCommand(name: string, text: string): Promise<void> {
		this.calls.push({ method: "sendCommand", name, text });
		if (this.failSend.has(name) || !this.sessions.has(name)) {
			throw new BoundaryError(`cannot send to ${name}`, {
				boundary: "multiplexer",
				sessionName: name,
			});
		}
	}

	async listSessionNames(): Promise<Set<string>> {
		this.calls.push({ method: "listSessionNames" });
		if (this.failList) {
			throw new BoundaryError("server unreachable", { boundary: "multiplexer" });
		}
		return new Set(this.sessions);
	}

	async killSession(name: string): Promise<void> {
		this.calls.push({ method: "killSession", name });
		if (this.failKill.has(name) || !this.sessions.has(name)) {
			throw new BoundaryError(`can't find session: ${name}`, {
				boundary: "multiplexer",
				sessionName: name,
			});
		}
		this.sessions.delete(name);
	}

	/** Calls of one method, in order. */
	callsOf<M extends MuxCall["method"]>(method: M): Extract<MuxCall, { method: M }>[] {
		return this.calls.filter((c): c is Extract<MuxCall, { method: M }> => c.method === method);
	}
}

/**
 * Spawner that answers from a handler keyed on argv and records every argv.
 * A handler returning an Error makes the spawn reject (binary missing).
 */
export function createFakeSpawner(
	handler: (args: readonly string[]) => Partial<SpawnResult> | Error,
): Spawner & { calls: string[][] } {
	const calls: string[][] = [];
	const spawner = async (args: readonly string[]): Promise<SpawnResult> => {
		calls.push([...args]);
		const answer = handler(args);
		if (answer instanceof Error) throw answer;
		return { exitCode: 0, stdout: "", stderr: "", ...answer };
	};
	return Object.assign(spawner, { calls });
}

export interface CapturedOutput {
	stdout(): string;
	stderr(): string;
	restore(): void;
}

/**
 * Swallow and record everything written to stdout/stderr, whether through
 * the streams directly or through console.log/console.error.
 */
export function captureOutput(): CapturedOutput {
	const out: string[] = [];
	const err: string[] = [];
	const spies = [
		vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
			out.push(String(chunk));
			return true;
		}),
		vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
			err.push(String(chunk));
			return true;
		}),
		vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
			out.push(`${args.map(String).join(" ")}\n`);
		}),
		vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
			err.push(`${args.map(String).join(" ")}\n`);
		}),
	];
	return {
		stdout: () => out.join(""),
		stderr: () => err.join(""),
		restore: () => {
			for (const spy of spies) spy.mockRestore();
		},
	};
}
