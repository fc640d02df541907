/**
 * Tool Registry & Dispatch
 *
 * Closed table from ToolIdentifier to tool, built once at startup and
 * shared by every plan. All tool calls go through `execute`, which
 * validates structured requests and converts anything a tool throws
 * into a failed ToolResult.
 */

import { ValidationError, errorMessage } from "../errors.js";
import { toolError, normalizeToolResult } from "./tool-result.js";
import { isToolIdentifier, type Tool, type ToolDescription, type ToolExecutionContext, type ToolIdentifier, type ToolRequest, type ToolResult } from "./types.js";
import type { Plan } from "../pipeline/planner/types.js";

export type ResolveToolResult =
  | { ok: true; tool: Tool }
  | { ok: false; error: ValidationError };

export class ToolRegistry {
  private readonly tools: ReadonlyMap<ToolIdentifier, Tool>;

  constructor(tools: readonly Tool[]) {
    const table = new Map<ToolIdentifier, Tool>();
    for (const tool of tools) {
      if (table.has(tool.name)) {
        throw new ValidationError(`Duplicate tool registration: ${tool.name}`);
      }
      table.set(tool.name, tool);
    }
    this.tools = table;
    Object.freeze(this);
  }

  has(name: ToolIdentifier): boolean {
    return this.tools.has(name);
  }

  get(name: ToolIdentifier): Tool | undefined {
    return this.tools.get(name);
  }

  names(): ToolIdentifier[] {
    return [...this.tools.keys()];
  }

  /**
   * Map a free-text name from model output to a registered tool.
   * Trimmed, case-insensitive, exact. No fuzzy matching.
   */
  resolveToolName(name: string): ResolveToolResult {
    const candidate = name.trim().toUpperCase();
    if (candidate === "") {
      return { ok: false, error: new ValidationError("Tool name is blank") };
    }
    if (!isToolIdentifier(candidate)) {
      return { ok: false, error: new ValidationError(`Unknown tool: "${name}"`) };
    }
    const tool = this.tools.get(candidate);
    if (!tool) {
      return { ok: false, error: new ValidationError(`Tool not registered: ${candidate}`) };
    }
    return { ok: true, tool };
  }

  describeTools(): ToolDescription[] {
    return [...this.tools.values()].map(tool => ({
      name: tool.name,
      description: tool.description,
      category: tool.category,
      exampleParameters: tool.descriptionObject,
    }));
  }

  /**
   * Single dispatch path. Never throws for tool-level problems: an unknown
   * tool, invalid parameters or an exception all come back as a failed result.
   */
  async execute(
    toolName: ToolIdentifier,
    plan: Plan,
    request: ToolRequest,
    ctx: ToolExecutionContext,
  ): Promise<ToolResult> {
    const tool = this.tools.get(toolName);
    if (!tool) {
      return toolError(toolName, `Tool not registered: ${toolName}`);
    }

    try {
      switch (tool.kind) {
        case "structured": {
          const parsed = tool.requestSchema.safeParse(request.parameters);
          if (!parsed.success) {
            const issues = parsed.error.issues
              .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
              .join("; ");
            return toolError(toolName, `Invalid parameters for ${toolName}: ${issues}`);
          }
          return normalizeToolResult(await tool.execute(plan, parsed.data, ctx));
        }
        case "legacy":
          return normalizeToolResult(
            await tool.execute(plan, request.instruction, request.stepContext, ctx),
          );
      }
    } catch (error) {
      ctx.log.warn("Tool threw during execution", { tool: toolName, error: errorMessage(error) });
      return toolError(toolName, errorMessage(error));
    }
  }
}

export function createToolRegistry(tools: readonly Tool[]): ToolRegistry {
  return new ToolRegistry(tools);
}
