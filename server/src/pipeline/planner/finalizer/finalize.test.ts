import { describe, it, expect } from "vitest";
import { fallbackAnswer, finalizePlan, renderFinalMessage } from "./finalize.js";
import { ReasoningError } from "../../../errors.js";
import { ScriptedGateway, makePlan, makeSteps } from "../../../testing/index.js";

describe("renderFinalMessage", () => {
  it("puts the question above the answer", () => {
    expect(renderFinalMessage(makePlan(), "June 3rd")).toBe("Question: Find the release date\nAnswer: June 3rd");
  });

  it("omits the question line for a blank instruction", () => {
    expect(renderFinalMessage(makePlan({ taskInstruction: "  " }), "n/a")).toBe("Answer: n/a");
  });
});

describe("fallbackAnswer", () => {
  it("explains a plan that never ran a step", () => {
    expect(fallbackAnswer(makePlan())).toBe("No answer could be produced: no steps were executed for this task.");
    expect(fallbackAnswer(makePlan({ failureReason: "Aborted: shutdown" })))
      .toBe("No answer could be produced: Aborted: shutdown");
  });

  it("summarizes step outcomes", () => {
    const plan = makePlan({ steps: makeSteps(["DONE", "FAILED"]), failureReason: "out of rounds" });
    expect(fallbackAnswer(plan)).toBe(
      "No final answer could be composed. 1 of 2 steps completed. Last result: S0 done. Failures: S1 broke. Plan stopped: out of rounds.",
    );
  });
});

describe("finalizePlan", () => {
  it("moves a COMPLETED plan to FINALIZED with the model's answer", async () => {
    const gateway = new ScriptedGateway().reply("FINALIZER_ANSWER", { answer: " June 3rd, 2025 " });
    const plan = makePlan({ status: "COMPLETED", originalLanguage: "French", steps: makeSteps(["DONE"]) });

    const message = await finalizePlan(gateway, plan);

    expect(message).toBe("Question: Find the release date\nAnswer: June 3rd, 2025");
    expect(plan.status).toBe("FINALIZED");
    expect(plan.finalAnswer).toBe("June 3rd, 2025");
    const [call] = gateway.calls;
    expect(call.outputLanguage).toBe("French");
    expect(call.mappingValue["Completed Steps"]).toBe("[0] ANALYSIS_REASONING: S0\nS0 output");
    expect(call.mappingValue["Failed Steps"]).toBe("(none)");
  });

  it("calls the model once however often it is invoked", async () => {
    const gateway = new ScriptedGateway().always("FINALIZER_ANSWER", { answer: "42" });
    const plan = makePlan({ status: "COMPLETED" });

    const first = await finalizePlan(gateway, plan);
    const second = await finalizePlan(gateway, plan);

    expect(second).toBe(first);
    expect(gateway.callsFor("FINALIZER_ANSWER")).toHaveLength(1);
  });

  it("still produces an answer for a failed plan with no steps", async () => {
    const gateway = new ScriptedGateway().reply("FINALIZER_ANSWER", { answer: "" });
    const plan = makePlan({ status: "FAILED", failureReason: "Tool reasoning returned 0 selections for 1 requirements" });

    const message = await finalizePlan(gateway, plan);

    expect(message).toBe(
      "Question: Find the release date\nAnswer: No answer could be produced: Tool reasoning returned 0 selections for 1 requirements",
    );
    expect(plan.status).toBe("FINALIZED");
  });

  it("completes a plan that is still RUNNING", async () => {
    const gateway = new ScriptedGateway().reply("FINALIZER_ANSWER", { answer: "partial" });
    const plan = makePlan();
    await finalizePlan(gateway, plan);
    expect(plan.status).toBe("FINALIZED");
  });

  it("leaves the language to the gateway default when intake found none", async () => {
    const gateway = new ScriptedGateway().reply("FINALIZER_ANSWER", { answer: "ok" });
    await finalizePlan(gateway, makePlan({ status: "COMPLETED", originalLanguage: "" }));
    expect(gateway.calls[0].outputLanguage).toBeUndefined();
  });

  it("propagates model failures and leaves the plan unfinalized", async () => {
    const gateway = new ScriptedGateway().fail("FINALIZER_ANSWER", new ReasoningError("FINALIZER_ANSWER call failed: timeout"));
    const plan = makePlan({ status: "COMPLETED" });

    await expect(finalizePlan(gateway, plan)).rejects.toBeInstanceOf(ReasoningError);
    expect(plan.status).toBe("COMPLETED");
    expect(plan.finalAnswer).toBeUndefined();
  });
});
