import { BitbucketHttpClient, type FetchLike } from "./adapters/bitbucket/bitbucket-http-client.js";
import { DEFAULT_CONFIG_FILE, loadConfig } from "./config/load-config.js";
import { CleanerContext } from "./core/cleaner-context.js";
import { type MenuExit, runMenu } from "./core/menu.js";
import { toRepoCleanerError } from "./errors.js";
import type { Logger } from "./interfaces/logger.js";
import type { Prompter } from "./interfaces/prompter.js";
import { noopLogger } from "./utils/noop-logger.js";

export interface StartCleanerOptions {
  prompter: Prompter;
  logger?: Logger;
  configFile?: string;
  protectedBranchesFile?: string;
  workingDirectory?: string;
  fetch?: FetchLike;
  now?: () => Date;
}

/**
 * Loads configuration, opens the API session and runs the menu.
 * Configuration failures end the run the same way a failed action does.
 */
export async function startCleaner(options: StartCleanerOptions): Promise<MenuExit> {
  const { prompter } = options;
  const logger = options.logger ?? noopLogger;

  prompter.print("Please apply the steps respectively.");
  try {
    const config = await loadConfig(options.configFile ?? DEFAULT_CONFIG_FILE);
    const api = new BitbucketHttpClient({
      ...config,
      verifyTls: false,
      fetch: options.fetch,
      logger,
    });
    const context = new CleanerContext({
      api,
      prompter,
      logger,
      protectedBranchesFile: options.protectedBranchesFile,
      workingDirectory: options.workingDirectory,
      now: options.now,
    });
    return await runMenu(context);
  } catch (err) {
    const error = toRepoCleanerError(err);
    prompter.print(`Unexpected exception: ${error.message}`);
    logger.error("Startup failed", { code: error.code, error });
    return "error";
  }
}
