import { StateError } from "../errors.js";
import type { BranchApi } from "../interfaces/branch-api.js";
import type { Logger } from "../interfaces/logger.js";
import type { Prompter } from "../interfaces/prompter.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface CleanerContextOptions {
  api: BranchApi;
  prompter: Prompter;
  logger?: Logger;
  /** Seeds the protected-branch file, normally from `--filename`. */
  protectedBranchesFile?: string;
  /** Directory snapshots are written to. Defaults to the process working directory. */
  workingDirectory?: string;
  now?: () => Date;
}

/**
 * Everything an operation needs: the API session, operator I/O, and the
 * project/repository/file selections made through the menu.
 */
export class CleanerContext {
  readonly api: BranchApi;
  readonly prompter: Prompter;
  readonly logger: Logger;
  readonly workingDirectory: string;
  readonly now: () => Date;

  projectKey = "";
  repositorySlug = "";
  protectedBranchesFile: string;

  constructor(options: CleanerContextOptions) {
    this.api = options.api;
    this.prompter = options.prompter;
    this.logger = options.logger ?? noopLogger;
    this.workingDirectory = options.workingDirectory ?? process.cwd();
    this.now = options.now ?? (() => new Date());
    this.protectedBranchesFile = options.protectedBranchesFile?.trim() ?? "";
  }

  requireProjectKey(): string {
    if (!this.projectKey) {
      throw new StateError("Project key is not set (menu option 1)");
    }
    return this.projectKey;
  }

  requireRepositorySlug(): string {
    if (!this.repositorySlug) {
      throw new StateError("Repository slug is not set (menu option 2)");
    }
    return this.repositorySlug;
  }
}
