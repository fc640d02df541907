/**
 * Plan Engine: wiring
 *
 * Builds the long-lived pieces (gateway, registry, repository, queues,
 * runner) once and exposes the task-level operations the HTTP routes and
 * the CLI use. Everything is injectable so tests can swap the LLM and
 * storage for in-process fakes.
 */

import { nanoid } from "nanoid";
import { createPlanLogger, createComponentLogger } from "./logging.js";
import { ReasoningError, errorMessage } from "./errors.js";
import * as config from "./config.js";
import { DefaultLlmGateway, type LlmGateway } from "./llm/gateway.js";
import { OpenAICompatibleClient } from "./llm/openai-compatible.js";
import { createToolRegistry, type ToolRegistry } from "./tools/registry.js";
import { createAnalysisReasoningTool } from "./tools/builtin/analysis-reasoning.js";
import { createKnowledgeTools, InMemoryKnowledgeStore } from "./tools/builtin/knowledge.js";
import { SqlitePlanRepository, type PlanRepository } from "./db/plan-repository.js";
import { BackgroundWorkQueue } from "./pipeline/background-queue.js";
import { PlanWorkerPool } from "./pipeline/plan-pool.js";
import { PlanLeaseRegistry } from "./pipeline/planner/execution/plan-lease.js";
import { PlanRunner } from "./pipeline/planner/execution/plan-runner.js";
import { normalizeTask } from "./pipeline/planner/intake/normalize-task.js";
import { seedKnowledgeSteps } from "./pipeline/planner/intake/seed-knowledge.js";
import { createPlan } from "./pipeline/planner/plan.js";
import type { Tool } from "./tools/types.js";
import type { FinalizedOutcome, Plan, TaskInput, TaskIntake } from "./pipeline/planner/types.js";

export type { FinalizedOutcome, Plan, TaskInput } from "./pipeline/planner/types.js";

const log = createComponentLogger("engine");

export interface PlanEngineOptions {
  gateway?: LlmGateway;
  /** Tools registered next to the built-in ones */
  tools?: Tool[];
  /** Replaces the built-in tools entirely */
  replaceBuiltinTools?: boolean;
  repository?: PlanRepository;
  maxConcurrentPlans?: number;
  maxBackgroundJobs?: number;
  maxPlanningRounds?: number;
  maxContextTokens?: number;
}

export interface SubmittedTask {
  plan: Plan;
  /** Settles once the plan is finalized */
  completion: Promise<FinalizedOutcome>;
}

export interface PlanEngine {
  readonly registry: ToolRegistry;
  readonly background: BackgroundWorkQueue;
  submitTask(input: TaskInput): Promise<SubmittedTask>;
  runTask(input: TaskInput): Promise<FinalizedOutcome>;
  getPlan(id: string): Promise<Plan | undefined>;
  listPlans(limit: number): Promise<Plan[]>;
  abortPlan(id: string): boolean;
  shutdown(timeoutMs?: number): Promise<void>;
}

function defaultGateway(): LlmGateway {
  if (!config.LLM_API_KEY) {
    log.warn("LLM_API_KEY is not set; requests go out unauthenticated", { baseUrl: config.LLM_BASE_URL });
  }
  return new DefaultLlmGateway({
    client: new OpenAICompatibleClient("openai-compatible", config.LLM_API_KEY, config.LLM_BASE_URL, config.LLM_PLANNER_MODEL),
    maxRetries: config.LLM_MAX_RETRIES,
  });
}

/** Used when intake cannot reach or understand the model. */
function fallbackIntake(input: TaskInput): TaskIntake {
  return {
    originalLanguage: "",
    normalizedInstruction: input.instruction.trim(),
    questionChecklist: [],
    initialKnowledgeQueries: [],
  };
}

export function createPlanEngine(options: PlanEngineOptions = {}): PlanEngine {
  const gateway = options.gateway ?? defaultGateway();
  const repository = options.repository ?? new SqlitePlanRepository(config.PLAN_DB_PATH);
  const background = new BackgroundWorkQueue(options.maxBackgroundJobs ?? config.MAX_BACKGROUND_JOBS);
  const leases = new PlanLeaseRegistry();

  const builtins: Tool[] = options.replaceBuiltinTools
    ? []
    : [createAnalysisReasoningTool(gateway), ...createKnowledgeTools(new InMemoryKnowledgeStore())];
  const registry = createToolRegistry([...builtins, ...(options.tools ?? [])]);

  const runner = new PlanRunner({
    gateway,
    registry,
    repository,
    background,
    leases,
    maxPlanningRounds: options.maxPlanningRounds ?? config.MAX_PLANNING_ROUNDS,
    maxContextTokens: options.maxContextTokens ?? config.MAX_CONTEXT_TOKENS,
  });
  const pool = new PlanWorkerPool(
    options.maxConcurrentPlans ?? config.MAX_CONCURRENT_PLANS,
    plan => runner.run(plan),
  );

  log.info("Plan engine ready", { tools: registry.names() });

  async function submitTask(input: TaskInput): Promise<SubmittedTask> {
    const correlationId = input.correlationId ?? nanoid();
    const taskLog = createPlanLogger("engine", correlationId);

    let intake: TaskIntake;
    try {
      intake = await normalizeTask(gateway, input, correlationId);
    } catch (error) {
      if (!(error instanceof ReasoningError)) throw error;
      taskLog.warn("Intake failed, planning from the raw instruction", { error: errorMessage(error) });
      intake = fallbackIntake(input);
    }

    const plan = createPlan({ ...input, correlationId }, intake);
    seedKnowledgeSteps(plan, registry);
    await repository.save(plan);
    taskLog.info("Task accepted", { planId: plan.id, seededSteps: plan.steps.length });

    const completion = pool.submit(plan);
    completion.catch((error: unknown) => {
      taskLog.error("Plan execution failed", error, { planId: plan.id });
    });
    return { plan, completion };
  }

  return {
    registry,
    background,
    submitTask,

    async runTask(input) {
      const { completion } = await submitTask(input);
      return completion;
    },

    getPlan: id => repository.findById(id),
    listPlans: limit => repository.listRecent(limit),
    abortPlan: id => leases.abort(id),

    async shutdown(timeoutMs = 30_000) {
      await pool.drain(timeoutMs);
      await background.shutdown(timeoutMs);
      await repository.close();
      log.info("Plan engine stopped");
    },
  };
}
