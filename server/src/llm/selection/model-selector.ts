/**
 * Model Selection Engine
 *
 * Determines which model role handles an LLM call.
 *
 * Decision tree:
 * 1. Explicit role override? → use it
 * 2. Quick mode? → fast
 * 3. Background mode? → background
 * 4. Everything else → planner
 */

import type { ModelRole, ModelRoleConfig } from "../types.js";
import { MODEL_ROLE_CONFIGS } from "../config.js";

export interface ModelSelectionCriteria {
  quick?: boolean;
  backgroundMode?: boolean;
  explicitRole?: ModelRole;
}

export interface ModelSelection extends ModelRoleConfig {
  reason: string;
}

/**
 * Select the model for a call. Every gateway call goes through here.
 */
export function selectModel(
  criteria: ModelSelectionCriteria,
  roleConfigs: Record<ModelRole, ModelRoleConfig> = MODEL_ROLE_CONFIGS,
): ModelSelection {
  if (criteria.explicitRole) {
    return { ...roleConfigs[criteria.explicitRole], reason: `explicit override: ${criteria.explicitRole}` };
  }
  if (criteria.quick) {
    return { ...roleConfigs.fast, reason: "quick mode → fast" };
  }
  if (criteria.backgroundMode) {
    return { ...roleConfigs.background, reason: "background mode → background" };
  }
  return { ...roleConfigs.planner, reason: "default → planner" };
}
