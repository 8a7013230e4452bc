// Multiplexer boundary. The launcher only ever talks to terminals through this
// interface; TmuxMultiplexer is the production implementation.

export interface CreateSessionOpts {
	/** Working directory for the session's shell. */
	cwd: string;
	/** Environment variables set inside the session. */
	env: Record<string, string>;
}

/**
 * Contract for a terminal multiplexer. Every method rejects with a
 * BoundaryError when the underlying call fails.
 */
export interface Multiplexer {
	/** Create a detached session. */
	createSession(name: string, opts: CreateSessionOpts): Promise<void>;

	/** Type `text` into the session's active pane and press Enter. */
	sendCommand(name: string, text: string): Promise<void>;

	/** Names of all live sessions. An idle server (no sessions) yields an empty set. */
	listSessionNames(): Promise<Set<string>>;

	/** Kill a session by exact name. */
	killSession(name: string): Promise<void>;
}
