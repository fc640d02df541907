/**
 * Prompt Template Helper
 *
 * Reads .md prompt files and injects values into |* Field *| placeholders.
 *
 * Usage:
 *   const prompt = await loadPrompt("pipeline/planner/prompts/planning-requirements.md", {
 *     "Task": plan.taskInstruction,
 *     "Completed Steps": completedSection,
 *   });
 */

import { readFile } from "fs/promises";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { createComponentLogger } from "./logging.js";

const log = createComponentLogger("prompt-template");

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const templateCache = new Map<string, string>();

/**
 * Replace every |* FieldName *| placeholder in `template`.
 * Fields are matched case-insensitively; unknown fields render as [MISSING: name].
 */
export function renderTemplate(
  template: string,
  fields: Record<string, string>,
  templateName = "inline",
): string {
  const lookup = new Map<string, string>();
  for (const [key, value] of Object.entries(fields)) {
    lookup.set(key.trim().toLowerCase(), value);
  }

  return template.replace(
    /\|\*\s*([^*]+?)\s*\*\|/g,
    (_match, fieldName: string) => {
      const key = fieldName.trim();
      const value = lookup.get(key.toLowerCase());
      if (value !== undefined) {
        return value;
      }
      log.warn("Unresolved prompt placeholder", { field: key, template: templateName });
      return `[MISSING: ${key}]`;
    },
  );
}

/**
 * Load a prompt template from a .md file relative to src/ and inject field values.
 *
 * @param relativePath Path relative to src/ (e.g. "pipeline/planner/prompts/tool-reasoning.md")
 */
export async function loadPrompt(
  relativePath: string,
  fields: Record<string, string>,
): Promise<string> {
  const fullPath = resolve(__dirname, relativePath);

  let template = templateCache.get(fullPath);
  if (template === undefined) {
    try {
      template = await readFile(fullPath, "utf-8");
    } catch (e) {
      log.error("Failed to read prompt template", e, { path: fullPath });
      throw new Error(`Prompt template not found: ${fullPath}`, { cause: e });
    }
    templateCache.set(fullPath, template);
  }

  return renderTemplate(template, fields, relativePath);
}
