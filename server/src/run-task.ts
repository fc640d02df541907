/**
 * Run one task from the command line and print the answer.
 *
 * Usage:
 *   npm run run-task -- "Summarize the open release blockers" [--quick] [--background]
 *     [--client <name>] [--project <name>]
 *
 * Logs go to stderr; stdout carries only the final message.
 */

import { initServerLogging } from "./logging.js";
import { createPlanEngine } from "./engine.js";
import type { TaskInput } from "./pipeline/planner/types.js";

export interface RunTaskArgs {
  input: TaskInput;
}

/** Returns undefined when no instruction was given. */
export function parseRunTaskArgs(argv: readonly string[]): RunTaskArgs | undefined {
  const positional: string[] = [];
  let quick = false;
  let backgroundMode = false;
  let clientName: string | undefined;
  let projectName: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--quick") quick = true;
    else if (arg === "--background") backgroundMode = true;
    else if (arg === "--client") clientName = argv[++i];
    else if (arg === "--project") projectName = argv[++i];
    else positional.push(arg);
  }

  const instruction = positional.join(" ").trim();
  if (instruction === "") return undefined;

  return {
    input: {
      instruction,
      quick,
      backgroundMode,
      workspace: { clientName: clientName ?? "default", projectName },
    },
  };
}

async function main(): Promise<number> {
  const args = parseRunTaskArgs(process.argv.slice(2));
  if (!args) {
    console.error('Usage: run-task "<instruction>" [--quick] [--background] [--client <name>] [--project <name>]');
    return 2;
  }

  const logger = initServerLogging({ stderrOnly: true });
  const engine = createPlanEngine({ maxConcurrentPlans: 1 });

  try {
    const outcome = await engine.runTask(args.input);
    process.stdout.write(outcome.message + "\n");
    return outcome.outcome === "COMPLETED" ? 0 : 1;
  } finally {
    await engine.shutdown();
    await logger.close();
  }
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, "/"))) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    },
  );
}
