/**
 * Plan Repository
 *
 * Persistence boundary for plans. The runner writes through after every
 * mutation; readers (HTTP, CLI) only ever see snapshots.
 */

import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { z } from "zod";
import { createComponentLogger } from "../logging.js";
import { runMigrations } from "./migrations.js";
import { parsePlanDocument } from "./plan-schema.js";
import type { Plan } from "../pipeline/planner/types.js";

const log = createComponentLogger("db.plans");

export interface PlanRepository {
  save(plan: Plan): Promise<void>;
  findById(id: string): Promise<Plan | undefined>;
  /** Most recently updated first */
  listRecent(limit: number): Promise<Plan[]>;
  close(): Promise<void>;
}

/** Deep copy so stored snapshots never alias the live plan. */
function snapshot(plan: Plan): Plan {
  return structuredClone(plan);
}

// ============================================
// IN-MEMORY
// ============================================

export class InMemoryPlanRepository implements PlanRepository {
  private plans = new Map<string, Plan>();

  async save(plan: Plan): Promise<void> {
    this.plans.set(plan.id, snapshot(plan));
  }

  async findById(id: string): Promise<Plan | undefined> {
    const plan = this.plans.get(id);
    return plan ? snapshot(plan) : undefined;
  }

  async listRecent(limit: number): Promise<Plan[]> {
    return [...this.plans.values()]
      .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
      .slice(0, limit)
      .map(snapshot);
  }

  async close(): Promise<void> {
    this.plans.clear();
  }
}

// ============================================
// SQLITE
// ============================================

const documentRowSchema = z.object({ document: z.string() });

export class SqlitePlanRepository implements PlanRepository {
  private readonly db: Database.Database;
  private readonly upsert: Database.Statement;
  private readonly selectById: Database.Statement;
  private readonly selectRecent: Database.Statement;

  /** ":memory:" opens an in-process database */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    runMigrations(this.db);

    this.upsert = this.db.prepare(`
      INSERT INTO plans (id, correlation_id, status, task_instruction, document, created_at, updated_at)
      VALUES (@id, @correlationId, @status, @taskInstruction, @document, @createdAt, @updatedAt)
      ON CONFLICT(id) DO UPDATE SET
        status = excluded.status,
        document = excluded.document,
        updated_at = excluded.updated_at
    `);
    this.selectById = this.db.prepare("SELECT document FROM plans WHERE id = ?");
    this.selectRecent = this.db.prepare(
      "SELECT document FROM plans ORDER BY updated_at DESC, rowid DESC LIMIT ?",
    );

    log.info("Plan store opened", { path: dbPath });
  }

  async save(plan: Plan): Promise<void> {
    this.upsert.run({
      id: plan.id,
      correlationId: plan.correlationId,
      status: plan.status,
      taskInstruction: plan.taskInstruction,
      document: JSON.stringify(plan),
      createdAt: plan.createdAt,
      updatedAt: plan.updatedAt,
    });
  }

  async findById(id: string): Promise<Plan | undefined> {
    const row = this.selectById.get(id);
    if (row === undefined) return undefined;
    return parsePlanDocument(documentRowSchema.parse(row).document);
  }

  async listRecent(limit: number): Promise<Plan[]> {
    return this.selectRecent
      .all(limit)
      .map(row => parsePlanDocument(documentRowSchema.parse(row).document));
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
