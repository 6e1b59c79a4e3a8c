import { describe, it, expect } from "vitest";
import { getExecutionOrder, getTaskDefinition, getTaskDefinitions } from "../src/pipeline/registry.js";
import { PipelineRuntime } from "../src/pipeline/runtime.js";
import { InMemoryTaskStore } from "../src/pipeline/store.js";
import { RunTrace } from "../src/trace/run_trace.js";
import { contentHash } from "../src/shared/hash.js";
import { makeConfig, makeWorkspace, quietLogger, scriptedRunner, StubConverter } from "./helpers.js";
import type { TaskContext } from "../src/pipeline/types.js";

describe("Task registry", () => {
  it("orders compile tasks with dependencies first", () => {
    expect(getExecutionOrder("compile")).toEqual([
      "LOAD_TEMPLATE",
      "COLLECT_FRAGMENTS",
      "CONVERT_FRAGMENTS",
      "MERGE_TEMPLATE",
      "WRITE_OUTPUT",
      "COMPILE_PDF",
    ]);
  });

  it("orders extract tasks", () => {
    expect(getExecutionOrder("extract")).toEqual(["READ_MERGED", "SPLIT_SECTIONS", "CONVERT_SECTIONS", "WRITE_SECTIONS"]);
  });

  it("every dependency exists in the same pipeline", () => {
    for (const kind of ["compile", "extract"] as const) {
      const types = new Set(getTaskDefinitions(kind).map((d) => d.taskType));
      for (const def of getTaskDefinitions(kind)) {
        for (const dep of def.dependsOn) expect(types.has(dep)).toBe(true);
      }
    }
  });

  it("rejects a task from the other pipeline", () => {
    expect(() => getTaskDefinition("extract", "LOAD_TEMPLATE")).toThrow(/Unknown task type/);
  });
});

describe("InMemoryTaskStore", () => {
  it("stores typed values and hashes them", () => {
    const store = new InMemoryTaskStore();
    const ref = store.set("merged_document", "run-1", "{\\rtf1}");
    expect(ref).toEqual({ kind: "merged_document", id: "run-1", hash: contentHash("{\\rtf1}") });
    expect(store.get("merged_document", "run-1")).toBe("{\\rtf1}");
    expect(store.has("merged_document", "run-2")).toBe(false);
    expect(store.size).toBe(1);
  });

  it("throws on a missing key", () => {
    expect(() => new InMemoryTaskStore().get("fragments", "x")).toThrow("TaskStore: key not found: fragments::x");
  });
});

describe("PipelineRuntime", () => {
  function context(): TaskContext {
    const ws = makeWorkspace({ "01.a.tex": "A" }, "{\\rtf1 nothing}");
    return {
      config: makeConfig(ws),
      runId: "run-1",
      converter: new StubConverter(),
      runCommand: scriptedRunner({}).runner,
      logger: quietLogger(),
      trace: new RunTrace("run-1"),
    };
  }

  it("stops at the first failed task and reports it", async () => {
    const run = await new PipelineRuntime("compile", context()).execute();

    expect(run.failed?.taskType).toBe("LOAD_TEMPLATE");
    expect(run.failed?.error).toMatch(/^Could not find string/);
    expect([...run.taskResults.keys()]).toEqual(["LOAD_TEMPLATE"]);
    expect(run.taskResults.get("LOAD_TEMPLATE")?.status).toBe("failed");
  });

  it("fails the extract pipeline without a source file", async () => {
    const run = await new PipelineRuntime("extract", context()).execute();
    expect(run.failed).toMatchObject({ taskType: "READ_MERGED", error: "No RTF file given to extract from" });
  });
});

describe("RunTrace", () => {
  function makeTrace(): RunTrace {
    const trace = new RunTrace("run-1");
    const t = new Date("2024-01-01T00:00:00Z");
    trace.record({ step: "LOAD_TEMPLATE", startedAt: t, completedAt: new Date(t.getTime() + 5) });
    trace.record({
      step: "WRITE_OUTPUT",
      startedAt: t,
      completedAt: t,
      outputs: [{ path: "/out/a.rtf", sha256: "abc" }],
    });
    return trace;
  }

  it("links records by hash", () => {
    const chain = makeTrace().getChain();
    expect(chain.map((r) => r.position)).toEqual([0, 1]);
    expect(chain[0].hashChain.previousHash).toBeNull();
    expect(chain[1].hashChain.previousHash).toBe(chain[0].hashChain.contentHash);
    expect(chain[0].durationMs).toBe(5);
  });

  it("validates an untouched chain", () => {
    expect(makeTrace().validateChain()).toEqual({ valid: true, errors: [] });
  });

  it("detects tampering", () => {
    const trace = makeTrace();
    const chain = trace.getChain();
    chain[1] = { ...chain[1], outputs: [{ path: "/out/a.rtf", sha256: "forged" }] };

    expect(trace.validateChain(chain)).toEqual({ valid: false, errors: ["Trace 1: content hash mismatch"] });
  });

  it("detects reordering", () => {
    const chain = makeTrace().getChain().reverse();
    const { valid, errors } = new RunTrace().validateChain(chain);
    expect(valid).toBe(false);
    expect(errors).toContain("Trace 0: position mismatch (expected 0, got 1)");
  });
});
