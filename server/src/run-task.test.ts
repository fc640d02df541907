import { describe, it, expect } from "vitest";
import { parseRunTaskArgs } from "./run-task.js";

describe("parseRunTaskArgs", () => {
  it("joins positional words into the instruction and reads flags", () => {
    expect(parseRunTaskArgs(["Summarize", "open", "issues", "--quick", "--client", "acme", "--project", "site"])).toEqual({
      input: {
        instruction: "Summarize open issues",
        quick: true,
        backgroundMode: false,
        workspace: { clientName: "acme", projectName: "site" },
      },
    });
  });

  it("defaults the workspace client", () => {
    expect(parseRunTaskArgs(["--background", "check the build"])?.input).toMatchObject({
      instruction: "check the build",
      backgroundMode: true,
      workspace: { clientName: "default" },
    });
  });

  it("returns undefined without an instruction", () => {
    expect(parseRunTaskArgs(["--quick"])).toBeUndefined();
    expect(parseRunTaskArgs([])).toBeUndefined();
  });
});
