/**
 * Test utilities, exported from the `"repo-cleaner/testing"` entry point.
 */
export type { DeleteCall } from "./testing/in-memory-branch-api.js";
export { InMemoryBranchApi, makeBranch } from "./testing/in-memory-branch-api.js";
export { ScriptedPrompter } from "./testing/scripted-prompter.js";
export { noopLogger } from "./utils/noop-logger.js";
