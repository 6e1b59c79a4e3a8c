import type { ProducedRef, TaskInputBundle, TaskResult } from "../types.js";

/** Success result for a task that started at `startedAt`. */
export function taskSucceeded(
  input: TaskInputBundle,
  startedAt: Date,
  producedRefs: ProducedRef[],
): TaskResult {
  const completedAt = new Date();
  return {
    status: "success",
    output: {
      taskType: input.taskType,
      taskId: input.taskId,
      correlationId: input.correlationId,
      producedRefs,
      timing: { startedAt, completedAt, durationMs: completedAt.getTime() - startedAt.getTime() },
      status: "success",
    },
  };
}
