/**
 * repo-cleaner public API barrel.
 * @module
 */

// Adapters
export type {
  BitbucketHttpClientOptions,
  FetchLike,
  HttpRequestInit,
  HttpResponse,
} from "./adapters/bitbucket/bitbucket-http-client.js";
export { BitbucketHttpClient, createFetch } from "./adapters/bitbucket/bitbucket-http-client.js";
export type { ReadlinePrompterOptions } from "./adapters/readline-prompter.js";
export { ReadlinePrompter } from "./adapters/readline-prompter.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
// Entry
export type { StartCleanerOptions } from "./cleaner.js";
export { startCleaner } from "./cleaner.js";
// Config
export type { CleanerConfig } from "./config/config-schema.js";
export { configSchema } from "./config/config-schema.js";
export { DEFAULT_CONFIG_FILE, loadConfig } from "./config/load-config.js";
// Core
export type { BranchOutcome, DeletionReport, SkipReason } from "./core/branch-operations.js";
export {
  deleteBranches,
  getProjectDetails,
  getRepositoryDetails,
  LIST_BRANCHES_OPTIONS,
  listBranches,
} from "./core/branch-operations.js";
export type { CleanerContextOptions } from "./core/cleaner-context.js";
export { CleanerContext } from "./core/cleaner-context.js";
export type { MenuExit, MenuHandler, MenuHandlers } from "./core/menu.js";
export { defaultMenuHandlers, MenuCommand, parseMenuChoice, runMenu } from "./core/menu.js";
export { loadProtectedBranches, parseProtectedBranches } from "./core/protected-branches.js";
export { saveBranches, snapshotFileName } from "./core/snapshot-writer.js";
// Errors
export {
  BitbucketApiError,
  ConfigError,
  errorMessage,
  RepoCleanerError,
  StateError,
  toRepoCleanerError,
} from "./errors.js";
// Interfaces
export type {
  BranchApi,
  BranchRecord,
  ListBranchesOptions,
  ProjectDetails,
  RepositoryDetails,
} from "./interfaces/branch-api.js";
export type { Logger } from "./interfaces/logger.js";
export type { Prompter } from "./interfaces/prompter.js";
