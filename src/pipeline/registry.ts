/**
 * Task Registry: task definitions and topological execution order per pipeline.
 */

import type { TaskDefinition, TaskType, PipelineKind } from "./types.js";
import {
  handleLoadTemplate,
  handleCollectFragments,
  handleConvertFragments,
  handleMergeTemplate,
  handleWriteOutput,
  handleCompilePdf,
  handleReadMerged,
  handleSplitSections,
  handleConvertSections,
  handleWriteSections,
} from "./tasks/index.js";

export const COMPILE_TASKS: TaskDefinition[] = [
  { taskType: "LOAD_TEMPLATE", handler: handleLoadTemplate, dependsOn: [] },
  { taskType: "COLLECT_FRAGMENTS", handler: handleCollectFragments, dependsOn: [] },
  {
    taskType: "CONVERT_FRAGMENTS",
    handler: handleConvertFragments,
    // template first: a missing placeholder fails before any conversion
    dependsOn: ["LOAD_TEMPLATE", "COLLECT_FRAGMENTS"],
  },
  { taskType: "MERGE_TEMPLATE", handler: handleMergeTemplate, dependsOn: ["CONVERT_FRAGMENTS"] },
  { taskType: "WRITE_OUTPUT", handler: handleWriteOutput, dependsOn: ["MERGE_TEMPLATE"] },
  { taskType: "COMPILE_PDF", handler: handleCompilePdf, dependsOn: ["WRITE_OUTPUT"] },
];

export const EXTRACT_TASKS: TaskDefinition[] = [
  { taskType: "READ_MERGED", handler: handleReadMerged, dependsOn: [] },
  { taskType: "SPLIT_SECTIONS", handler: handleSplitSections, dependsOn: ["READ_MERGED"] },
  { taskType: "CONVERT_SECTIONS", handler: handleConvertSections, dependsOn: ["SPLIT_SECTIONS"] },
  { taskType: "WRITE_SECTIONS", handler: handleWriteSections, dependsOn: ["CONVERT_SECTIONS"] },
];

export function getTaskDefinitions(kind: PipelineKind): TaskDefinition[] {
  return kind === "compile" ? COMPILE_TASKS : EXTRACT_TASKS;
}

/**
 * Get the topological execution order for a pipeline.
 * Returns tasks sorted so that dependencies come before dependents;
 * ties keep declaration order.
 */
export function getExecutionOrder(kind: PipelineKind): TaskType[] {
  const definitions = getTaskDefinitions(kind);
  const defMap = new Map(definitions.map((d) => [d.taskType, d]));
  const visited = new Set<TaskType>();
  const visiting = new Set<TaskType>();
  const order: TaskType[] = [];

  function visit(taskType: TaskType): void {
    if (visited.has(taskType)) return;
    if (visiting.has(taskType)) throw new Error(`Task dependency cycle at ${taskType}`);
    const def = defMap.get(taskType);
    if (!def) throw new Error(`Unknown task type for ${kind} pipeline: ${taskType}`);
    visiting.add(taskType);
    for (const dep of def.dependsOn) {
      visit(dep);
    }
    visiting.delete(taskType);
    visited.add(taskType);
    order.push(taskType);
  }

  for (const def of definitions) {
    visit(def.taskType);
  }

  return order;
}

/**
 * Lookup a task definition by type.
 */
export function getTaskDefinition(kind: PipelineKind, taskType: TaskType): TaskDefinition {
  const def = getTaskDefinitions(kind).find((d) => d.taskType === taskType);
  if (!def) throw new Error(`Unknown task type for ${kind} pipeline: ${taskType}`);
  return def;
}
