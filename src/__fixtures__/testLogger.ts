import { Logger, type LogLevel } from "../observability";

export interface CapturedLog {
  logger: Logger;
  lines: string[];
  entries(): Array<Record<string, unknown>>;
  messages(): string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A Logger whose lines are kept in memory instead of written to the console. */
export function captureLogs(level: LogLevel = "debug"): CapturedLog {
  const lines: string[] = [];
  const logger = new Logger({ component: "test", runId: "run-test" }, { level, writer: (line) => lines.push(line) });

  const entries = () =>
    lines.map((line) => {
      const parsed: unknown = JSON.parse(line);
      return isRecord(parsed) ? parsed : {};
    });

  return {
    logger,
    lines,
    entries,
    messages: () => entries().map((entry) => String(entry.msg)),
  };
}
