/**
 * Configuration loading.
 *
 * Reads `.crew/config.yaml` from the working directory (or an explicit path),
 * deep-merges it over DEFAULT_CONFIG and validates the result. A missing
 * default file is not an error; a missing explicit file is.
 */

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError, errorMessage } from "./errors.ts";
import { DEFAULT_MAX_NAME_ATTEMPTS, DEFAULT_MAX_NAME_LENGTH } from "./launch/namer.ts";
import type { CrewConfig } from "./types.ts";

export const CREW_DIR = ".crew";
export const CONFIG_FILENAME = "config.yaml";

export const DEFAULT_CONFIG: CrewConfig = {
	runtime: {
		default: "claude",
		permissionMode: "bypass",
	},
	sessions: {
		prefix: "",
		maxNameAttempts: DEFAULT_MAX_NAME_ATTEMPTS,
		maxNameLength: DEFAULT_MAX_NAME_LENGTH,
	},
	launch: {
		concurrency: 1,
		staggerDelayMs: 0,
	},
	tmux: {
		command: "tmux",
	},
};

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge `override` into `base`. Objects merge key by key; any
 * other value (including arrays) replaces. Returns a new object.
 */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
	const merged: PlainObject = { ...base };
	for (const [key, value] of Object.entries(override)) {
		const existing = merged[key];
		merged[key] =
			isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
	}
	return merged;
}

function section(raw: PlainObject, key: string, configPath: string | undefined): PlainObject {
	const value = raw[key];
	if (!isPlainObject(value)) {
		throw new ConfigError(`${key} must be a mapping`, { configPath, field: key });
	}
	return value;
}

function readString(
	obj: PlainObject,
	field: string,
	configPath: string | undefined,
	opts: { allowEmpty?: boolean } = {},
): string {
	const value = obj[field.slice(field.lastIndexOf(".") + 1)];
	if (typeof value !== "string" || (!opts.allowEmpty && value.trim().length === 0)) {
		throw new ConfigError(`${field} must be a${opts.allowEmpty ? "" : " non-empty"} string`, {
			configPath,
			field,
		});
	}
	return value;
}

function readInteger(
	obj: PlainObject,
	field: string,
	min: number,
	configPath: string | undefined,
): number {
	const value = obj[field.slice(field.lastIndexOf(".") + 1)];
	if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
		throw new ConfigError(`${field} must be an integer >= ${min}`, { configPath, field });
	}
	return value;
}

/**
 * Check a merged raw config and narrow it to CrewConfig.
 *
 * @throws ConfigError naming the first invalid field
 */
export function validateConfig(raw: PlainObject, configPath?: string): CrewConfig {
	const runtime = section(raw, "runtime", configPath);
	const sessions = section(raw, "sessions", configPath);
	const launch = section(raw, "launch", configPath);
	const tmux = section(raw, "tmux", configPath);

	const permissionMode = runtime.permissionMode;
	if (permissionMode !== "bypass" && permissionMode !== "ask") {
		throw new ConfigError('runtime.permissionMode must be "bypass" or "ask"', {
			configPath,
			field: "runtime.permissionMode",
		});
	}

	const config: CrewConfig = {
		runtime: {
			default: readString(runtime, "runtime.default", configPath),
			permissionMode,
		},
		sessions: {
			prefix: readString(sessions, "sessions.prefix", configPath, { allowEmpty: true }),
			maxNameAttempts: readInteger(sessions, "sessions.maxNameAttempts", 0, configPath),
			maxNameLength: readInteger(sessions, "sessions.maxNameLength", 8, configPath),
		},
		launch: {
			concurrency: readInteger(launch, "launch.concurrency", 1, configPath),
			staggerDelayMs: readInteger(launch, "launch.staggerDelayMs", 0, configPath),
		},
		tmux: {
			command: readString(tmux, "tmux.command", configPath),
		},
	};

	if (runtime.model !== undefined && runtime.model !== null) {
		config.runtime.model = readString(runtime, "runtime.model", configPath);
	}

	return config;
}

async function readConfigFile(path: string): Promise<string | null> {
	try {
		return await readFile(path, "utf8");
	} catch (err) {
		if (isPlainObject(err) && err.code === "ENOENT") return null;
		throw new ConfigError(`Cannot read config file: ${path}`, { configPath: path, cause: err });
	}
}

/**
 * Load configuration for a working directory.
 *
 * @param cwd - Directory containing `.crew/`
 * @param explicitPath - A --config path; must exist when given
 * @throws ConfigError on unreadable files, malformed YAML or invalid values
 */
export async function loadConfig(cwd: string, explicitPath?: string): Promise<CrewConfig> {
	const configPath = explicitPath
		? resolve(cwd, explicitPath)
		: join(cwd, CREW_DIR, CONFIG_FILENAME);
	const text = await readConfigFile(configPath);

	if (text === null) {
		if (explicitPath) {
			throw new ConfigError(`Config file not found: ${configPath}`, { configPath });
		}
		return structuredClone(DEFAULT_CONFIG);
	}

	let parsed: unknown;
	try {
		parsed = parseYaml(text);
	} catch (err) {
		throw new ConfigError(`Invalid YAML in ${configPath}: ${errorMessage(err)}`, {
			configPath,
			cause: err,
		});
	}

	// An empty file parses to null: defaults apply.
	if (parsed === null || parsed === undefined) {
		return structuredClone(DEFAULT_CONFIG);
	}
	if (!isPlainObject(parsed)) {
		throw new ConfigError(`${configPath} must contain a YAML mapping`, { configPath });
	}

	const defaults: PlainObject = { ...DEFAULT_CONFIG };
	return validateConfig(deepMerge(defaults, parsed), configPath);
}
