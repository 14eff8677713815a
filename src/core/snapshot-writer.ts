import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { listBranches } from "./branch-operations.js";
import type { CleanerContext } from "./cleaner-context.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `branches-<slug>-<YYYY-MM-DD>.txt`, dated in local time. */
export function snapshotFileName(repositorySlug: string, date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  return `branches-${repositorySlug}-${day}.txt`;
}

/**
 * Writes every branch display name, one per line, to today's snapshot file.
 * An existing snapshot from the same day is overwritten.
 */
export async function saveBranches(context: CleanerContext): Promise<string> {
  const branches = await listBranches(context);
  const path = join(context.workingDirectory, snapshotFileName(context.repositorySlug, context.now()));

  await writeFile(path, branches.map((branch) => `${branch.displayId}\n`).join(""), "utf-8");

  context.prompter.print(`Branches saved to ${path}.`);
  context.logger.info("Saved branch snapshot", { path, count: branches.length });
  return path;
}
