import { describe, expect, it } from "vitest";
import { StateError } from "../errors.js";
import { InMemoryBranchApi } from "../testing/in-memory-branch-api.js";
import { ScriptedPrompter } from "../testing/scripted-prompter.js";
import { noopLogger } from "../utils/noop-logger.js";
import { CleanerContext } from "./cleaner-context.js";

function makeContext(protectedBranchesFile?: string): CleanerContext {
  return new CleanerContext({
    api: new InMemoryBranchApi(),
    prompter: new ScriptedPrompter(),
    protectedBranchesFile,
  });
}

describe("CleanerContext", () => {
  it("starts with nothing selected", () => {
    const context = makeContext();

    expect(context.projectKey).toBe("");
    expect(context.repositorySlug).toBe("");
    expect(context.protectedBranchesFile).toBe("");
    expect(context.logger).toBe(noopLogger);
    expect(context.workingDirectory).toBe(process.cwd());
  });

  it("seeds the protected-branch file trimmed", () => {
    expect(makeContext("  not-allowed-branches ").protectedBranchesFile).toBe(
      "not-allowed-branches",
    );
  });

  it("requireProjectKey throws until a key is set", () => {
    const context = makeContext();

    expect(() => context.requireProjectKey()).toThrow(StateError);
    context.projectKey = "ISPJ";
    expect(context.requireProjectKey()).toBe("ISPJ");
  });

  it("requireRepositorySlug throws until a slug is set", () => {
    const context = makeContext();

    expect(() => context.requireRepositorySlug()).toThrow("Repository slug is not set (menu option 2)");
    context.repositorySlug = "repo1";
    expect(context.requireRepositorySlug()).toBe("repo1");
  });
});
