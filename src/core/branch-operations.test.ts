import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StateError } from "../errors.js";
import { InMemoryBranchApi, makeBranch } from "../testing/in-memory-branch-api.js";
import { ScriptedPrompter } from "../testing/scripted-prompter.js";
import {
  deleteBranches,
  getProjectDetails,
  getRepositoryDetails,
  LIST_BRANCHES_OPTIONS,
  listBranches,
} from "./branch-operations.js";
import { CleanerContext } from "./cleaner-context.js";

describe("branch operations", () => {
  let dir: string;
  let api: InMemoryBranchApi;
  let prompter: ScriptedPrompter;
  let context: CleanerContext;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "repo-cleaner-ops-test-"));
    api = new InMemoryBranchApi([
      makeBranch("main", true),
      makeBranch("develop"),
      makeBranch("feature/a"),
      makeBranch("feature/b"),
    ]);
    prompter = new ScriptedPrompter();
    context = new CleanerContext({ api, prompter, workingDirectory: dir });
    context.projectKey = "ISPJ";
    context.repositorySlug = "repo1";
    context.protectedBranchesFile = join(dir, "not-allowed-branches");
    await writeFile(context.protectedBranchesFile, "develop\n");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("getProjectDetails", () => {
    it("prints and returns the project", async () => {
      const details = await getProjectDetails(context);

      expect(details).toEqual({ key: "ISPJ", name: "Project ISPJ" });
      expect(prompter.printed).toEqual([JSON.stringify(details, null, 2)]);
    });

    it("throws StateError when the project key is not set", async () => {
      context.projectKey = "";

      await expect(getProjectDetails(context)).rejects.toThrow(StateError);
    });
  });

  describe("getRepositoryDetails", () => {
    it("prints and returns the repository", async () => {
      const details = await getRepositoryDetails(context);

      expect(details).toEqual({ slug: "repo1", project: { key: "ISPJ" } });
      expect(prompter.printed).toEqual([JSON.stringify(details, null, 2)]);
    });

    it("throws StateError when the slug is not set", async () => {
      context.repositorySlug = "";

      await expect(getRepositoryDetails(context)).rejects.toThrow("Repository slug is not set");
    });
  });

  describe("listBranches", () => {
    it("requests all branches with details in one call", async () => {
      const branches = await listBranches(context);

      expect(branches.map((b) => b.displayId)).toEqual(["main", "develop", "feature/a", "feature/b"]);
      expect(api.listCalls).toEqual([LIST_BRANCHES_OPTIONS]);
      expect(LIST_BRANCHES_OPTIONS).toEqual({
        filter: "",
        limit: 99999,
        details: true,
        boostMatches: false,
      });
    });
  });

  describe("deleteBranches", () => {
    it("deletes everything except protected and default branches, in listing order", async () => {
      const report = await deleteBranches(context);

      expect(api.deleteCalls).toEqual([
        { projectKey: "ISPJ", repositorySlug: "repo1", branchName: "feature/a" },
        { projectKey: "ISPJ", repositorySlug: "repo1", branchName: "feature/b" },
      ]);
      expect(report.outcomes).toEqual([
        { branch: "main", status: "skipped", reason: "default" },
        { branch: "develop", status: "skipped", reason: "protected" },
        { branch: "feature/a", status: "deleted" },
        { branch: "feature/b", status: "deleted" },
      ]);
      expect(report.deleted).toEqual(["feature/a", "feature/b"]);
      expect(report.failed).toEqual([]);
    });

    it("prints one line per branch and a summary", async () => {
      await deleteBranches(context);

      expect(prompter.printed).toEqual([
        "Skipping default branch 'main'.",
        "Skipping protected branch 'develop'.",
        "Deleted branch 'feature/a'.",
        "Deleted branch 'feature/b'.",
        "Deleted 2, skipped 2, failed 0.",
      ]);
    });

    it("reports a failed deletion and continues with the rest", async () => {
      api.failOnDelete.add("feature/a");

      const report = await deleteBranches(context);

      expect(api.deleteCalls.map((c) => c.branchName)).toEqual(["feature/a", "feature/b"]);
      expect(report.failed).toEqual(["feature/a"]);
      expect(report.deleted).toEqual(["feature/b"]);
      expect(report.outcomes[2]).toEqual({
        branch: "feature/a",
        status: "failed",
        error: "Branch feature/a is locked",
      });
      expect(prompter.printed).toContain(
        "Failure while deleting branch 'feature/a': Branch feature/a is locked",
      );
    });

    it("treats a missing protected-branch file as no protection", async () => {
      context.protectedBranchesFile = join(dir, "typo");

      const report = await deleteBranches(context);

      expect(report.deleted).toEqual(["develop", "feature/a", "feature/b"]);
      expect(prompter.printed[0]).toBe(
        `Failure during execution: ${join(dir, "typo")} could not be found.`,
      );
    });

    it("never deletes the default branch even when nothing is protected", async () => {
      context.protectedBranchesFile = "";

      await deleteBranches(context);

      expect(api.deleteCalls.map((c) => c.branchName)).not.toContain("main");
      expect(api.branches.map((b) => b.displayId)).toEqual(["main"]);
    });

    it("throws StateError before deleting anything when the project key is missing", async () => {
      context.projectKey = "";

      await expect(deleteBranches(context)).rejects.toThrow(StateError);
      expect(api.deleteCalls).toEqual([]);
    });

    it("reports only the state error when the slug is missing and no file is set", async () => {
      context.repositorySlug = "";
      context.protectedBranchesFile = "";

      await expect(deleteBranches(context)).rejects.toThrow("Repository slug is not set");
      expect(prompter.printed).toEqual([]);
      expect(api.listCalls).toEqual([]);
    });
  });
});
