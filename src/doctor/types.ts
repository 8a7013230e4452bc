import type { Spawner } from "../spawn.ts";
import type { CrewConfig } from "../types.ts";

/** Categories of doctor checks, in report order. */
export type DoctorCategory = "dependencies" | "config";

/** Status of a single doctor check. */
export type DoctorStatus = "pass" | "warn" | "fail";

export interface DoctorCheck {
	name: string;
	category: DoctorCategory;
	status: DoctorStatus;
	message: string;
	details?: string[];
}

export interface DoctorContext {
	cwd: string;
	config: CrewConfig;
	/** --config path, when one was given. */
	configPath?: string;
	spawner: Spawner;
}

export type DoctorCheckFn = (ctx: DoctorContext) => Promise<DoctorCheck[]>;
