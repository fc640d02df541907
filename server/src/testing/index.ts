/**
 * Test helpers: a scripted LLM gateway, fake tools and plan builders.
 * Import only from *.test.ts files.
 */

import { nanoid } from "nanoid";
import { ReasoningError } from "../errors.js";
import { toolError, toolSuccess } from "../tools/tool-result.js";
import { getServerLogger } from "../logging.js";
import type { LlmCallRequest, LlmCallResult, LlmGateway, PromptType } from "../llm/gateway.js";
import type { BackgroundScheduler, LegacyTool, ToolExecutionContext, ToolIdentifier, ToolResult } from "../tools/types.js";
import type { Plan, PlanStep, StepStatus } from "../pipeline/planner/types.js";

// ─── Scripted gateway ─────────────────────────────────────────────────────────

export interface RecordedCall {
  promptType: PromptType;
  mappingValue: Record<string, string>;
  correlationId: string;
  quick: boolean;
  backgroundMode: boolean;
  outputLanguage?: string;
}

type Responder = (call: RecordedCall) => unknown;

/**
 * Replies are queued per prompt type and consumed in order; `always`
 * sets the reply used once the queue is empty. Replies are validated
 * with the caller's schema, like the real gateway does.
 */
export class ScriptedGateway implements LlmGateway {
  readonly calls: RecordedCall[] = [];
  private readonly queues = new Map<PromptType, Responder[]>();
  private readonly defaults = new Map<PromptType, Responder>();

  reply(promptType: PromptType, ...replies: unknown[]): this {
    const queue = this.queues.get(promptType) ?? [];
    queue.push(...replies.map(reply => () => reply));
    this.queues.set(promptType, queue);
    return this;
  }

  replyWith(promptType: PromptType, responder: Responder): this {
    const queue = this.queues.get(promptType) ?? [];
    queue.push(responder);
    this.queues.set(promptType, queue);
    return this;
  }

  fail(promptType: PromptType, error: Error): this {
    return this.replyWith(promptType, () => { throw error; });
  }

  always(promptType: PromptType, reply: unknown): this {
    this.defaults.set(promptType, () => reply);
    return this;
  }

  callsFor(promptType: PromptType): RecordedCall[] {
    return this.calls.filter(c => c.promptType === promptType);
  }

  async callLlm<T>(request: LlmCallRequest<T>): Promise<LlmCallResult<T>> {
    const call: RecordedCall = {
      promptType: request.promptType,
      mappingValue: request.mappingValue,
      correlationId: request.correlationId,
      quick: request.quick,
      backgroundMode: request.backgroundMode,
      outputLanguage: request.outputLanguage,
    };
    this.calls.push(call);

    const responder = this.queues.get(request.promptType)?.shift() ?? this.defaults.get(request.promptType);
    if (!responder) {
      throw new ReasoningError(`No scripted reply for ${request.promptType}`);
    }

    const parsed = request.responseSchema.safeParse(responder(call));
    if (!parsed.success) {
      throw new ReasoningError(`${request.promptType} reply did not match the expected structure`);
    }
    return { result: parsed.data, model: "scripted" };
  }
}

// ─── Tools ────────────────────────────────────────────────────────────────────

export interface FakeToolCall {
  planId: string;
  instruction: string;
  stepContext: string;
}

export type FakeTool = LegacyTool & { calls: FakeToolCall[] };

/**
 * Legacy tool that records its calls. Returns `respond(instruction)` or a
 * success echoing the instruction's first line.
 */
export function makeFakeTool(
  name: ToolIdentifier,
  respond?: (instruction: string) => ToolResult | Promise<ToolResult>,
): FakeTool {
  const calls: FakeToolCall[] = [];
  return {
    kind: "legacy",
    name,
    category: "test",
    description: `${name} test double.`,
    descriptionObject: { input: "text" },
    calls,
    async execute(plan, taskDescription, stepContext) {
      calls.push({ planId: plan.id, instruction: taskDescription, stepContext });
      if (respond) return respond(taskDescription);
      const firstLine = taskDescription.split("\n", 1)[0];
      return toolSuccess(name, `${name} ok: ${firstLine}`, `output of ${firstLine}`);
    },
  };
}

export function makeFailingTool(name: ToolIdentifier, errorMessage: string): FakeTool {
  return makeFakeTool(name, () => toolError(name, errorMessage));
}

// ─── Context ──────────────────────────────────────────────────────────────────

export function makeBackground(): BackgroundScheduler & { jobs: Array<() => Promise<void>> } {
  const jobs: Array<() => Promise<void>> = [];
  return {
    jobs,
    enqueue(_label, _correlationId, work) {
      jobs.push(work);
      return true;
    },
  };
}

export function makeToolCtx(overrides: Partial<ToolExecutionContext> = {}): ToolExecutionContext {
  return {
    correlationId: "corr-test",
    quick: false,
    backgroundMode: false,
    log: getServerLogger().child({ component: "server.test" }),
    background: makeBackground(),
    ...overrides,
  };
}

// ─── Plans ────────────────────────────────────────────────────────────────────

export function makePlan(overrides: Partial<Plan> = {}): Plan {
  return {
    id: "plan-test",
    correlationId: "corr-test",
    taskInstruction: "Find the release date",
    normalizedInstruction: "Find the release date",
    originalLanguage: "English",
    quick: false,
    backgroundMode: false,
    workspace: { clientName: "acme" },
    questionChecklist: [],
    initialKnowledgeQueries: [],
    steps: [],
    status: "RUNNING",
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

/** Step at position `order`; DONE steps get a success result named after the label. */
export function makeStep(
  order: number,
  status: StepStatus,
  label = `S${order}`,
  toolName: ToolIdentifier = "ANALYSIS_REASONING",
): PlanStep {
  const step: PlanStep = {
    id: nanoid(),
    order,
    stepToolName: toolName,
    stepInstruction: label,
    status,
  };
  if (status === "DONE") step.toolResult = toolSuccess(toolName, `${label} done`, `${label} output`);
  if (status === "FAILED") step.toolResult = toolError(toolName, `${label} broke`);
  return step;
}

export function makeSteps(statuses: StepStatus[]): PlanStep[] {
  return statuses.map((status, order) => makeStep(order, status));
}
