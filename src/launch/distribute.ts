import { ValidationError } from "../errors.ts";

/**
 * Split task ids across replicas round-robin in input order: the task at
 * position i goes to replica i mod replicaCount.
 *
 * Every replica gets an array (possibly empty), so the result always has
 * exactly replicaCount entries and per-replica counts differ by at most one.
 * Same input, same output: re-launches reproduce the same assignment.
 */
export function distributeTasks(taskIds: readonly string[], replicaCount: number): string[][] {
	if (!Number.isInteger(replicaCount) || replicaCount < 1) {
		throw new ValidationError("Replica count must be a positive integer", {
			field: "replicaCount",
			value: replicaCount,
		});
	}

	const assignment = Array.from({ length: replicaCount }, (): string[] => []);
	taskIds.forEach((taskId, i) => {
		assignment[i % replicaCount]?.push(taskId);
	});
	return assignment;
}
