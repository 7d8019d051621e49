import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export type LogWriter = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  level?: LogLevel;
  writer?: LogWriter;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const consoleWriter: LogWriter = (line, level) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.writer = options.writer ?? consoleWriter;
  }

  get runId(): string {
    return this.context.runId;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { level: this.level, writer: this.writer });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writer(JSON.stringify(payload), level);
  }
}
