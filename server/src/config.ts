/**
 * Server Configuration
 *
 * Environment variables for the LLM provider, plan engine limits,
 * persistence and logging. Importable by any module that needs config
 * without pulling in the full server.
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@planloom/shared/logging";

// Load .env from project root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, "../../.env") });

// ============================================
// PARSING HELPERS
// ============================================

export function readInt(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.error(`⚠️  Ignoring ${name}=${raw} (expected integer >= ${min}), using ${fallback}`);
    return fallback;
  }
  return value;
}

export function readString(name: string, fallback: string): string {
  const raw = process.env[name];
  return raw && raw.trim() !== "" ? raw.trim() : fallback;
}

// ============================================
// NETWORK
// ============================================

export const PORT = readInt("PORT", 3000, 1);

// ============================================
// LLM PROVIDER
// ============================================

export const LLM_BASE_URL = readString("LLM_BASE_URL", "https://api.openai.com/v1");
export const LLM_API_KEY = process.env.LLM_API_KEY || "";

export const LLM_PLANNER_MODEL = readString("LLM_PLANNER_MODEL", "gpt-4o");
export const LLM_FAST_MODEL = readString("LLM_FAST_MODEL", "gpt-4o-mini");
export const LLM_BACKGROUND_MODEL = readString("LLM_BACKGROUND_MODEL", LLM_FAST_MODEL);

/** Per-attempt timeout for normal calls */
export const LLM_TIMEOUT_MS = readInt("LLM_TIMEOUT_MS", 120_000, 1);
/** Per-attempt timeout for quick-mode calls */
export const LLM_QUICK_TIMEOUT_MS = readInt("LLM_QUICK_TIMEOUT_MS", 30_000, 1);
export const LLM_MAX_RETRIES = readInt("LLM_MAX_RETRIES", 2);

// ============================================
// PLAN ENGINE
// ============================================

export const MAX_CONCURRENT_PLANS = readInt("MAX_CONCURRENT_PLANS", 4, 1);
export const MAX_BACKGROUND_JOBS = readInt("MAX_BACKGROUND_JOBS", 2, 1);
export const MAX_PLANNING_ROUNDS = readInt("MAX_PLANNING_ROUNDS", 8, 1);
export const MAX_CONTEXT_TOKENS = readInt("MAX_CONTEXT_TOKENS", 32_000, 1);

// ============================================
// PERSISTENCE & LOGGING
// ============================================

/** ":memory:" keeps plans in an in-process database */
export const PLAN_DB_PATH = readString("PLAN_DB_PATH", resolve(__dirname, "../../data/plans.db"));

/** File logging is enabled only when LOG_DIR is set */
export const LOG_DIR = process.env.LOG_DIR || "";

const rawLevel = process.env.LOG_LEVEL || "";
export const LOG_LEVEL: LogLevel | undefined = isLogLevel(rawLevel) ? rawLevel : undefined;
