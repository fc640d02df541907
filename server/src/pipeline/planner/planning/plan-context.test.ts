import { describe, it, expect } from "vitest";
import {
  buildCompletedTranscript,
  buildFailedTranscript,
  buildPlanContext,
  buildProgressSummary,
  formatChecklist,
  formatStepHeading,
  formatWorkspace,
  truncate,
} from "./plan-context.js";
import { makePlan, makeStep, makeSteps } from "../../../testing/index.js";

describe("formatting helpers", () => {
  it("truncates with an ellipsis", () => {
    expect(truncate("abcdef", 3)).toBe("abc…");
    expect(truncate("abc", 3)).toBe("abc");
  });

  it("renders only the workspace fields that are set", () => {
    expect(formatWorkspace({ clientName: "acme", projectName: "site" })).toBe("Client: acme\nProject: site");
  });

  it("renders an empty checklist as (none)", () => {
    expect(formatChecklist([])).toBe("(none)");
    expect(formatChecklist(["When?", "Where?"])).toBe("- When?\n- Where?");
  });

  it("uses the first instruction line in step headings", () => {
    const step = makeStep(4, "PENDING", "search notes\nquery: v2", "KNOWLEDGE_SEARCH");
    expect(formatStepHeading(step)).toBe("[4] KNOWLEDGE_SEARCH: search notes");
  });
});

describe("buildPlanContext", () => {
  it("says so when there are no steps", () => {
    expect(buildPlanContext(makePlan())).toBe("No steps yet.");
  });

  it("groups steps by outcome", () => {
    const plan = makePlan({ steps: makeSteps(["DONE", "FAILED", "PENDING"]) });
    expect(buildPlanContext(plan)).toBe([
      "COMPLETED:",
      "[0] ANALYSIS_REASONING: S0",
      "  → S0 done",
      "",
      "FAILED:",
      "[1] ANALYSIS_REASONING: S1",
      "  ✗ S1 broke",
      "",
      "PENDING:",
      "[2] ANALYSIS_REASONING: S2",
    ].join("\n"));
  });
});

describe("buildProgressSummary", () => {
  it("counts steps and lists the last three completed", () => {
    const plan = makePlan({ steps: makeSteps(["DONE", "DONE", "DONE", "DONE", "FAILED", "PENDING"]) });
    expect(buildProgressSummary(plan)).toBe([
      "Progress: 4/6 steps completed (1 failed, 1 pending)",
      "Recently completed:",
      "- ANALYSIS_REASONING: S1 done",
      "- ANALYSIS_REASONING: S2 done",
      "- ANALYSIS_REASONING: S3 done",
    ].join("\n"));
  });

  it("omits the recent list for an empty plan", () => {
    expect(buildProgressSummary(makePlan())).toBe("Progress: 0/0 steps completed (0 failed, 0 pending)");
  });
});

describe("transcripts", () => {
  const plan = makePlan({ steps: makeSteps(["DONE", "FAILED"]) });

  it("carry step output for completed steps", () => {
    expect(buildCompletedTranscript(plan)).toBe("[0] ANALYSIS_REASONING: S0\nS0 output");
  });

  it("carry error messages for failed steps", () => {
    expect(buildFailedTranscript(plan)).toBe("[1] ANALYSIS_REASONING: S1\nError: S1 broke");
  });

  it("render (none) when empty", () => {
    expect(buildCompletedTranscript(makePlan())).toBe("(none)");
    expect(buildFailedTranscript(makePlan())).toBe("(none)");
  });
});
