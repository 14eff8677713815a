import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { Prompter } from "../interfaces/prompter.js";

export interface ReadlinePrompterOptions {
  input?: Readable;
  output?: Writable;
}

/**
 * Prompter over a readline interface. Lines typed ahead of a question are
 * queued, so piped input answers the prompts in order.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly output: Writable;
  private readonly buffered: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private closed = false;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      terminal: false,
    });
    this.rl.on("line", (line) => {
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on("close", () => {
      this.closed = true;
      if (this.waiting) {
        const resolve = this.waiting;
        this.waiting = null;
        resolve(null);
      }
    });
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);
    const next = this.buffered.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
