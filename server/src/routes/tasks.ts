/**
 * Task Routes
 *
 * Submit a task, read plans, stop a running plan.
 */

import type { Hono } from "hono";
import { z } from "zod";
import { createComponentLogger } from "../logging.js";
import { ValidationError, errorMessage } from "../errors.js";
import type { PlanEngine } from "../engine.js";

const log = createComponentLogger("routes.tasks");

const taskBodySchema = z.object({
  instruction: z.string().trim().min(1, "instruction is required"),
  quick: z.boolean().optional(),
  backgroundMode: z.boolean().optional(),
  /** Wait for the final answer instead of returning 202 right away */
  wait: z.boolean().optional(),
  workspace: z.object({
    clientName: z.string().trim().min(1),
    clientDescription: z.string().optional(),
    projectName: z.string().optional(),
    projectDescription: z.string().optional(),
  }).optional(),
});

export function registerTaskRoutes(app: Hono, engine: PlanEngine): void {
  // Submit a task
  app.post("/api/tasks", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Body must be JSON" }, 400);
    }

    const parsed = taskBodySchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(body)"}: ${i.message}`);
      return c.json({ error: "Invalid task", issues }, 400);
    }

    const { wait, ...input } = parsed.data;
    try {
      const { plan, completion } = await engine.submitTask(input);

      if (!wait) {
        return c.json({ planId: plan.id, correlationId: plan.correlationId, status: plan.status, message: null }, 202);
      }

      const outcome = await completion;
      return c.json({
        planId: outcome.planId,
        correlationId: outcome.correlationId,
        status: "FINALIZED",
        outcome: outcome.outcome,
        message: outcome.message,
      });
    } catch (error) {
      if (error instanceof ValidationError) {
        return c.json({ error: error.message }, 400);
      }
      log.error("Task submission failed", error);
      return c.json({ error: errorMessage(error) }, 500);
    }
  });

  // Recent plans (summaries)
  app.get("/api/plans", async (c) => {
    const limit = Math.min(Math.max(parseInt(c.req.query("limit") || "20", 10) || 20, 1), 100);
    const plans = await engine.listPlans(limit);
    return c.json({
      plans: plans.map(p => ({
        id: p.id,
        status: p.status,
        taskInstruction: p.taskInstruction,
        steps: p.steps.length,
        updatedAt: p.updatedAt,
      })),
      count: plans.length,
    });
  });

  // Full plan document
  app.get("/api/plans/:id", async (c) => {
    const plan = await engine.getPlan(c.req.param("id"));
    if (!plan) return c.json({ error: "Plan not found" }, 404);
    return c.json(plan);
  });

  // Stop a running plan between steps
  app.post("/api/plans/:id/abort", (c) => {
    const planId = c.req.param("id");
    const aborted = engine.abortPlan(planId);
    return c.json({ planId, aborted }, aborted ? 200 : 409);
  });
}
