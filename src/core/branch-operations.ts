import { errorMessage } from "../errors.js";
import type {
  BranchRecord,
  ListBranchesOptions,
  ProjectDetails,
  RepositoryDetails,
} from "../interfaces/branch-api.js";
import type { CleanerContext } from "./cleaner-context.js";
import { loadProtectedBranches } from "./protected-branches.js";

/** Asks for everything in one page; the client still follows further pages if the server caps it. */
export const LIST_BRANCHES_OPTIONS: Readonly<ListBranchesOptions> = {
  filter: "",
  limit: 99999,
  details: true,
  boostMatches: false,
};

export type SkipReason = "protected" | "default";

export type BranchOutcome =
  | { branch: string; status: "deleted" }
  | { branch: string; status: "skipped"; reason: SkipReason }
  | { branch: string; status: "failed"; error: string };

export interface DeletionReport {
  /** One entry per listed branch, in listing order. */
  outcomes: BranchOutcome[];
  deleted: string[];
  failed: string[];
}

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export async function getProjectDetails(context: CleanerContext): Promise<ProjectDetails> {
  const details = await context.api.getProject(context.requireProjectKey());
  context.prompter.print(pretty(details));
  return details;
}

export async function getRepositoryDetails(context: CleanerContext): Promise<RepositoryDetails> {
  const details = await context.api.getRepository(
    context.requireProjectKey(),
    context.requireRepositorySlug(),
  );
  context.prompter.print(pretty(details));
  return details;
}

export async function listBranches(context: CleanerContext): Promise<BranchRecord[]> {
  const branches = await context.api.getBranches(
    context.requireProjectKey(),
    context.requireRepositorySlug(),
    { ...LIST_BRANCHES_OPTIONS },
  );
  context.logger.debug?.("Listed branches", {
    projectKey: context.projectKey,
    repositorySlug: context.repositorySlug,
    count: branches.length,
  });
  return branches;
}

/**
 * Deletes every listed branch that is neither protected nor the default branch.
 * A failed deletion is reported and the remaining branches are still attempted.
 */
export async function deleteBranches(context: CleanerContext): Promise<DeletionReport> {
  const projectKey = context.requireProjectKey();
  const repositorySlug = context.requireRepositorySlug();
  const protectedNames = new Set(await loadProtectedBranches(context));
  const report: DeletionReport = { outcomes: [], deleted: [], failed: [] };

  for (const branch of await listBranches(context)) {
    const name = branch.displayId;

    if (protectedNames.has(name)) {
      context.prompter.print(`Skipping protected branch '${name}'.`);
      report.outcomes.push({ branch: name, status: "skipped", reason: "protected" });
      continue;
    }
    if (branch.isDefault) {
      context.prompter.print(`Skipping default branch '${name}'.`);
      report.outcomes.push({ branch: name, status: "skipped", reason: "default" });
      continue;
    }

    try {
      await context.api.deleteBranch(projectKey, repositorySlug, name);
      context.prompter.print(`Deleted branch '${name}'.`);
      context.logger.info("Deleted branch", { projectKey, repositorySlug, branch: name });
      report.outcomes.push({ branch: name, status: "deleted" });
      report.deleted.push(name);
    } catch (err) {
      const message = errorMessage(err);
      context.prompter.print(`Failure while deleting branch '${name}': ${message}`);
      context.logger.warn("Failed to delete branch", { projectKey, repositorySlug, branch: name, error: err });
      report.outcomes.push({ branch: name, status: "failed", error: message });
      report.failed.push(name);
    }
  }

  const skipped = report.outcomes.length - report.deleted.length - report.failed.length;
  context.prompter.print(
    `Deleted ${report.deleted.length}, skipped ${skipped}, failed ${report.failed.length}.`,
  );
  return report;
}
