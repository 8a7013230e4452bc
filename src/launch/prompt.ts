import { ROLE_DEFS } from "../roles.ts";
import type { Role } from "../types.ts";

export const TASK_SECTION_HEADING = "Assigned tasks (work them in this order):";

/**
 * Build the role header that opens every rendered prompt.
 *
 * Format:
 *   [CREW] role: <role>
 *   <role summary>
 */
export function buildRoleHeader(role: Role): string {
	return [`[CREW] role: ${role}`, ROLE_DEFS[role].summary].join("\n");
}

/** Numbered task list, one id per line. Ids are serialized as given. */
export function formatTaskList(taskIds: readonly string[]): string {
	return taskIds.map((id, i) => `${i + 1}. ${id}`).join("\n");
}

/**
 * Render the instruction text for one replica: role header, the base prompt
 * verbatim, and (only when tasks are assigned) the ordered task section.
 * Pure: same inputs, same string.
 */
export function renderPrompt(
	role: Role,
	basePrompt: string,
	assignedTasks: readonly string[],
): string {
	const sections = [buildRoleHeader(role), basePrompt];
	if (assignedTasks.length > 0) {
		sections.push(`${TASK_SECTION_HEADING}\n${formatTaskList(assignedTasks)}`);
	}
	return sections.join("\n\n");
}
