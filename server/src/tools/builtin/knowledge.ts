/**
 * KNOWLEDGE_SEARCH / KNOWLEDGE_STORE: built-in structured tools
 *
 * A small in-process knowledge base scoped by workspace client. Stores are
 * handed to the background queue so the plan never waits on indexing.
 */

import { z } from "zod";
import { nanoid } from "nanoid";
import { toolSuccess } from "../tool-result.js";
import { defineStructuredTool, type Tool } from "../types.js";

export interface KnowledgeEntry {
  id: string;
  scope: string;
  title: string;
  content: string;
  storedAt: string;
}

export interface KnowledgeStore {
  add(entry: Omit<KnowledgeEntry, "id" | "storedAt">): Promise<KnowledgeEntry>;
  search(scope: string, query: string, limit: number): Promise<KnowledgeEntry[]>;
}

function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(t => t.length > 1);
}

/** Keyword-overlap ranking; ties keep insertion order. */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private entries: KnowledgeEntry[] = [];

  async add(entry: Omit<KnowledgeEntry, "id" | "storedAt">): Promise<KnowledgeEntry> {
    const stored: KnowledgeEntry = { ...entry, id: nanoid(), storedAt: new Date().toISOString() };
    this.entries.push(stored);
    return stored;
  }

  async search(scope: string, query: string, limit: number): Promise<KnowledgeEntry[]> {
    const terms = new Set(tokenize(query));
    if (terms.size === 0) return [];

    return this.entries
      .filter(e => e.scope === scope)
      .map(entry => {
        const words = tokenize(`${entry.title} ${entry.content}`);
        const score = words.filter(w => terms.has(w)).length;
        return { entry, score };
      })
      .filter(r => r.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(r => r.entry);
  }
}

const searchRequestSchema = z.object({
  query: z.string().trim().min(1),
  limit: z.coerce.number().int().min(1).max(20).default(5),
});

const storeRequestSchema = z.object({
  title: z.string().trim().min(1),
  content: z.string().trim().min(1),
});

export function createKnowledgeTools(store: KnowledgeStore): Tool[] {
  const search = defineStructuredTool({
    kind: "structured",
    name: "KNOWLEDGE_SEARCH",
    category: "knowledge",
    description: "Search previously stored knowledge for this client by keywords.",
    descriptionObject: { query: "deployment checklist", limit: 5 },
    requestSchema: searchRequestSchema,

    async execute(plan, request) {
      const hits = await store.search(plan.workspace.clientName, request.query, request.limit);
      if (hits.length === 0) {
        return toolSuccess("KNOWLEDGE_SEARCH", `No stored knowledge matches "${request.query}"`, "");
      }
      const content = hits.map(h => `## ${h.title}\n${h.content}`).join("\n\n");
      return toolSuccess("KNOWLEDGE_SEARCH", `Found ${hits.length} entries for "${request.query}"`, content);
    },
  });

  const save = defineStructuredTool({
    kind: "structured",
    name: "KNOWLEDGE_STORE",
    category: "knowledge",
    description: "Store a finding so later tasks for this client can search it.",
    descriptionObject: { title: "Release process", content: "Releases are cut from main every Friday." },
    requestSchema: storeRequestSchema,

    async execute(plan, request, ctx) {
      const accepted = ctx.background.enqueue("knowledge-store", ctx.correlationId, async () => {
        await store.add({ scope: plan.workspace.clientName, title: request.title, content: request.content });
      });
      const summary = accepted
        ? `Queued "${request.title}" for storage`
        : `Storage unavailable, "${request.title}" was not stored`;
      return toolSuccess("KNOWLEDGE_STORE", summary, request.content);
    },
  });

  return [search, save];
}
