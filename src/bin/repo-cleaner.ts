#!/usr/bin/env node
import { ReadlinePrompter } from "../adapters/readline-prompter.js";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { startCleaner } from "../cleaner.js";
import { errorMessage } from "../errors.js";
import { HELP_TEXT, parseArgs, type CliArgs } from "./parse-args.js";

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}\nRun with --help for usage.`);
    process.exit(1);
  }

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const logger = new StructuredLogger({
    component: "repo-cleaner",
    level: args.verbose ? LogLevel.DEBUG : LogLevel.WARN,
  });
  logger.debug("Parsed arguments", { ...args });

  const prompter = new ReadlinePrompter();
  try {
    const exit = await startCleaner({
      prompter,
      logger,
      configFile: args.configFile,
      protectedBranchesFile: args.filename,
    });
    logger.debug("Menu finished", { exit });
  } finally {
    prompter.close();
  }
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
