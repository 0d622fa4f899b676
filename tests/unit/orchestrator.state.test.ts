import { describe, it, expect, afterEach } from "vitest";
import { appendTrace, createInitialState, truncationNote } from "../../src/orchestrator/state.js";
import { Stage } from "../../src/orchestrator/machine.js";
import { ProcessData } from "../../src/schemas/process.js";
import { setTestSink, TelemetryEvents, type TelemetryShape } from "../../src/utils/telemetry.js";

const process = ProcessData.parse({ name: "Onboarding", steps: [{ stepName: "Collect documents" }] });

function traceState(reasoningTrace: string[], droppedTraceEntries = 0) {
  return { threadId: "thread-1", reasoningTrace, droppedTraceEntries };
}

describe("createInitialState", () => {
  it("starts at CheckContext with empty working fields", () => {
    const state = createInitialState({ threadId: "thread-1", process, maxCycles: 3 });

    expect(state.stage).toBe(Stage.CheckContext);
    expect(state.phase).toBe("initialization");
    expect(state.maxCycles).toBe(3);
    expect(state.messages).toEqual([]);
    expect(state.findings).toEqual([]);
    expect(state.cycleCount).toBe(0);
    expect(state.reasoningTrace).toEqual([]);
  });
});

describe("truncationNote", () => {
  it("uses singular and plural forms", () => {
    expect(truncationNote(1)).toBe("[1 earlier trace entry truncated]");
    expect(truncationNote(7)).toBe("[7 earlier trace entries truncated]");
  });
});

describe("appendTrace", () => {
  const events: Array<{ name: string; data: TelemetryShape }> = [];

  afterEach(() => {
    setTestSink(null);
    events.length = 0;
  });

  it("appends without truncating while under the limit", () => {
    expect(appendTrace(traceState(["a", "b", "c"]), ["d"], 4)).toEqual({
      reasoningTrace: ["a", "b", "c", "d"],
      droppedTraceEntries: 0,
    });
  });

  it("drops the oldest entries behind a single note", () => {
    setTestSink((name, data) => events.push({ name, data }));

    const result = appendTrace(traceState(["a", "b", "c"]), ["d", "e"], 4);

    expect(result).toEqual({
      reasoningTrace: ["[2 earlier trace entries truncated]", "c", "d", "e"],
      droppedTraceEntries: 2,
    });
    expect(events).toEqual([
      {
        name: TelemetryEvents.ReasoningTraceTruncated,
        data: { thread_id: "thread-1", dropped_now: 2, dropped_total: 2 },
      },
    ]);
  });

  it("keeps one cumulative note across truncations", () => {
    const first = appendTrace(traceState(["a", "b", "c"]), ["d", "e"], 4);
    const second = appendTrace({ threadId: "thread-1", ...first }, ["f"], 4);

    expect(second).toEqual({
      reasoningTrace: ["[3 earlier trace entries truncated]", "d", "e", "f"],
      droppedTraceEntries: 3,
    });
  });

  it("keeps the note when later entries still fit", () => {
    const state = traceState(["[2 earlier trace entries truncated]", "c"], 2);
    expect(appendTrace(state, ["d"], 4)).toEqual({
      reasoningTrace: ["[2 earlier trace entries truncated]", "c", "d"],
      droppedTraceEntries: 2,
    });
  });
});
