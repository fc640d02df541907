import { describe, it, expect } from "vitest";
import { createAnalysisReasoningTool } from "./analysis-reasoning.js";
import { createToolRegistry } from "../registry.js";
import { ReasoningError } from "../../errors.js";
import { ScriptedGateway, makePlan, makeToolCtx } from "../../testing/index.js";

describe("ANALYSIS_REASONING", () => {
  it("returns the model's summary and content", async () => {
    const gateway = new ScriptedGateway().reply("ANALYSIS_REASONING", { summary: "v2 is newer", content: "v2 shipped after v1" });
    const registry = createToolRegistry([createAnalysisReasoningTool(gateway)]);

    const result = await registry.execute(
      "ANALYSIS_REASONING",
      makePlan(),
      { instruction: "Compare versions", parameters: {}, stepContext: "" },
      makeToolCtx({ quick: true }),
    );

    expect(result).toEqual({ success: true, toolName: "ANALYSIS_REASONING", summary: "v2 is newer", content: "v2 shipped after v1" });
    const [call] = gateway.calls;
    expect(call.quick).toBe(true);
    expect(call.mappingValue).toEqual({
      "Task": "Find the release date",
      "Instruction": "Compare versions",
      "Step Context": "(nothing gathered yet)",
    });
  });

  it("turns a model failure into a failed step result", async () => {
    const gateway = new ScriptedGateway().fail("ANALYSIS_REASONING", new ReasoningError("ANALYSIS_REASONING call failed: timeout"));
    const registry = createToolRegistry([createAnalysisReasoningTool(gateway)]);

    const result = await registry.execute(
      "ANALYSIS_REASONING",
      makePlan(),
      { instruction: "Compare", parameters: {}, stepContext: "" },
      makeToolCtx(),
    );

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe("ANALYSIS_REASONING call failed: timeout");
  });
});
