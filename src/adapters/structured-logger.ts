import type { Logger } from "../interfaces/logger.js";
import { isSensitiveKey, REDACTED, redactCredentials, redactValue } from "../utils/redact-credentials.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  /** Defaults to WARN so the interactive menu on stdout stays readable. */
  level?: LogLevel;
  component?: string;
}

/**
 * JSON-lines logger on stderr. Context values pass through credential
 * redaction; an Error becomes `<key>` (message), `<key>Stack` and, when it
 * wraps another error, `<key>Cause`.
 */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly threshold: LogLevel;
  private readonly component?: string;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.threshold = options.level ?? LogLevel.WARN;
    this.component = options.component;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, msg, ctx);
  }

  private write(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.threshold) return;

    const head = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg: redactCredentials(msg),
      ...(this.component ? { component: this.component } : {}),
    };
    let line: string;
    try {
      line = JSON.stringify({ ...contextFields(ctx), ...head });
    } catch {
      // e.g. a BigInt in ctx: keep the fields we control
      line = JSON.stringify({ ...head, serializationError: true });
    }
    this.writer(line);
  }
}

function contextFields(ctx: Record<string, unknown> | undefined): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(ctx ?? {})) {
    if (RESERVED_KEYS.has(key)) continue;
    if (isSensitiveKey(key)) {
      fields[key] = REDACTED;
    } else if (value instanceof Error) {
      fields[key] = redactCredentials(value.message);
      fields[`${key}Stack`] = value.stack === undefined ? undefined : redactCredentials(value.stack);
      if (value.cause instanceof Error) fields[`${key}Cause`] = redactCredentials(value.cause.message);
    } else {
      fields[key] = redactValue(value);
    }
  }
  return fields;
}
