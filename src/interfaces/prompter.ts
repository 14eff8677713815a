/**
 * Operator-facing terminal I/O.
 * @module
 */

export interface Prompter {
  /** Resolves with the operator's answer, or null once input is closed. */
  ask(question: string): Promise<string | null>;
  print(line: string): void;
  close(): void;
}
