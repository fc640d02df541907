/**
 * LLM Configuration: Model Roles
 *
 * Role configs define which model handles each kind of call and how long
 * a single attempt may take. Model names come from the environment.
 */

import type { ModelRole, ModelRoleConfig } from "./types.js";
import {
  LLM_PLANNER_MODEL,
  LLM_FAST_MODEL,
  LLM_BACKGROUND_MODEL,
  LLM_TIMEOUT_MS,
  LLM_QUICK_TIMEOUT_MS,
} from "../config.js";

export const MODEL_ROLE_CONFIGS: Record<ModelRole, ModelRoleConfig> = {
  planner: {
    role: "planner",
    model: LLM_PLANNER_MODEL,
    temperature: 0.0,
    maxTokens: 4096,
    timeoutMs: LLM_TIMEOUT_MS,
  },
  fast: {
    role: "fast",
    model: LLM_FAST_MODEL,
    temperature: 0.0,
    maxTokens: 2048,
    timeoutMs: LLM_QUICK_TIMEOUT_MS,
  },
  background: {
    role: "background",
    model: LLM_BACKGROUND_MODEL,
    temperature: 0.2,
    maxTokens: 4096,
    timeoutMs: LLM_TIMEOUT_MS,
  },
};
