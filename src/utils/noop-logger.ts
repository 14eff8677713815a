import type { Logger } from "../interfaces/logger.js";

/** Discards everything; the default wherever no logger is injected. */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
