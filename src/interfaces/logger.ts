/**
 * Diagnostic logger. Operator-facing text goes through the Prompter instead;
 * this channel records what the tool did and why it failed.
 * @module
 */

export interface Logger {
  debug?(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}
