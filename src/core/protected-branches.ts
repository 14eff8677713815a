import { readFile } from "node:fs/promises";
import { errorMessage } from "../errors.js";
import type { CleanerContext } from "./cleaner-context.js";

/**
 * One trimmed entry per line. A trailing newline does not add an entry;
 * blank lines in between become "" and never match a branch.
 */
export function parseProtectedBranches(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => line.trim());
}

/**
 * Re-reads the protected-branch file on every call.
 * Read failures are reported and yield an empty list, which protects nothing.
 */
export async function loadProtectedBranches(context: CleanerContext): Promise<string[]> {
  const path = context.protectedBranchesFile;
  if (!path) {
    context.prompter.print("Failure during execution: no protected-branch file is set.");
    context.logger.warn("Protected-branch file not set; no branches are protected");
    return [];
  }

  try {
    return parseProtectedBranches(await readFile(path, "utf-8"));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      context.prompter.print(`Failure during execution: ${path} could not be found.`);
      context.logger.warn("Protected-branch file not found; no branches are protected", { path });
    } else {
      context.prompter.print(`Unexpected exception: ${errorMessage(err)}`);
      context.logger.warn("Failed to read protected-branch file", { path, error: err });
    }
    return [];
  }
}
