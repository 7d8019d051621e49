import os from "node:os";
import { loadConfig, type ConfigOverrides, type ExtractorConfig } from "../config";
import { ConfigError, errorMessage } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { extract } from "../pipeline/orchestrator";
import { createStore } from "../store";
import { describeStrategy, selectStrategy } from "../tiers";
import { normalizeBookId } from "../types";

export type CommandName = "extract" | "status" | "plan";

export type ParsedCliArgs =
  | {
      command: "extract";
      bookId: string;
      configPath?: string;
      totalPages?: number;
      retryPages: number[];
      forceSequential: boolean;
      ignoreHttpsErrors: boolean;
    }
  | { command: "status"; bookId: string; configPath?: string }
  | { command: "plan"; totalPages: number; configPath?: string };

export type CliParseResult = ParsedCliArgs | "help" | { error: string };

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

const HELP_TEXT = `
Usage:
  book-extract <command> [options]

Commands:
  extract <bookId>     Fetch, parse and persist every page of a book
  status <bookId>      Print the stored checkpoint and book metadata for a book
  plan <totalPages>    Print the strategy a book of that size would use

Options:
  --config <path>          Optional path to JSON config file
  --total-pages <n>        Skip page-count discovery (extract)
  --retry-pages <list>     Comma-separated pages to attempt again, e.g. 5,7 (extract)
  --force-sequential       Always use the sequential tier (extract)
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -h, --help               Show this help
`;

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function parsePositiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  return value > 0 ? value : undefined;
}

function parsePageList(raw: string): number[] | undefined {
  const pages: number[] = [];
  for (const part of raw.split(",")) {
    const page = parsePositiveInt(part.trim());
    if (page === undefined) {
      return undefined;
    }
    pages.push(page);
  }
  return pages;
}

export function parseCliArgs(argv: string[]): CliParseResult {
  if (argv.includes("-h") || argv.includes("--help") || argv.length === 0) {
    return "help";
  }

  const [command, target] = argv;
  const configPath = optionValue(argv, "--config");
  if (argv.includes("--config") && configPath === undefined) {
    return { error: "--config needs a path" };
  }

  switch (command) {
    case "extract": {
      if (!target || target.startsWith("--")) {
        return { error: "extract needs a book id" };
      }

      let totalPages: number | undefined;
      const totalRaw = optionValue(argv, "--total-pages");
      if (argv.includes("--total-pages")) {
        totalPages = parsePositiveInt(totalRaw);
        if (totalPages === undefined) {
          return { error: `invalid --total-pages value: ${totalRaw ?? "(missing)"}` };
        }
      }

      let retryPages: number[] = [];
      if (argv.includes("--retry-pages")) {
        const retryRaw = optionValue(argv, "--retry-pages");
        const parsed = retryRaw === undefined ? undefined : parsePageList(retryRaw);
        if (parsed === undefined) {
          return { error: `invalid --retry-pages value: ${retryRaw ?? "(missing)"}` };
        }
        retryPages = parsed;
      }

      return {
        command,
        bookId: target,
        configPath,
        totalPages,
        retryPages,
        forceSequential: argv.includes("--force-sequential"),
        ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
      };
    }
    case "status":
      if (!target || target.startsWith("--")) {
        return { error: "status needs a book id" };
      }
      return { command, bookId: target, configPath };
    case "plan": {
      const totalPages = parsePositiveInt(target);
      if (totalPages === undefined) {
        return { error: `plan needs a positive page count, got ${target ?? "(missing)"}` };
      }
      return { command, totalPages, configPath };
    }
    default:
      return { error: `unknown command: ${command}` };
  }
}

function cliOverrides(parsed: ParsedCliArgs): ConfigOverrides {
  if (parsed.command !== "extract") {
    return {};
  }
  const overrides: ConfigOverrides = {};
  if (parsed.forceSequential) {
    overrides.forceSequential = true;
  }
  if (parsed.ignoreHttpsErrors) {
    overrides.ignoreHttpsErrors = true;
  }
  return overrides;
}

async function runExtractCommand(
  parsed: Extract<ParsedCliArgs, { command: "extract" }>,
  config: Readonly<ExtractorConfig>,
  logger: Logger,
): Promise<number> {
  const metrics = new MetricsRegistry();
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warn("shutdown_requested", { signal });
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const result = await extract(parsed.bookId, config, {
      totalPages: parsed.totalPages,
      retryPages: parsed.retryPages,
      signal: controller.signal,
      logger,
      metrics,
    });
    console.log(JSON.stringify(result, null, 2));
    return result.fatalError === undefined ? EXIT_OK : EXIT_FATAL;
  } finally {
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
    metrics.printSummary();
  }
}

async function runStatusCommand(
  parsed: Extract<ParsedCliArgs, { command: "status" }>,
  config: Readonly<ExtractorConfig>,
): Promise<number> {
  const bookId = normalizeBookId(parsed.bookId);
  const store = createStore(config);
  try {
    const checkpoint = (await store.lastCheckpoint(bookId)) ?? 0;
    const persistedPages = await store.countPages(bookId);
    const metadata = await store.getBookMetadata(bookId);
    console.log(
      JSON.stringify(
        {
          bookId,
          checkpoint,
          persistedPages,
          title: metadata?.title,
          pageCountInternal: metadata?.pageCountInternal,
          pageCountPrinted: metadata?.pageCountPrinted,
          volumes: metadata?.volumes.length,
        },
        null,
        2,
      ),
    );
    return EXIT_OK;
  } finally {
    await store.close();
  }
}

function runPlanCommand(parsed: Extract<ParsedCliArgs, { command: "plan" }>, config: Readonly<ExtractorConfig>): number {
  const strategy = selectStrategy(parsed.totalPages, config, os.availableParallelism());
  console.log(JSON.stringify({ totalPages: parsed.totalPages, strategy: describeStrategy(strategy) }, null, 2));
  return EXIT_OK;
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return EXIT_OK;
  }
  if ("error" in parsed) {
    console.error(parsed.error);
    console.error(HELP_TEXT.trim());
    return EXIT_USAGE;
  }

  let config: Readonly<ExtractorConfig>;
  try {
    config = loadConfig(parsed.configPath, cliOverrides(parsed));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`invalid configuration: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const logger = new Logger({ component: "cli", runId: createRunId() }, { level: config.logLevel });
  logger.info("command_start", { command: parsed.command });

  try {
    switch (parsed.command) {
      case "extract":
        return await runExtractCommand(parsed, config, logger);
      case "status":
        return await runStatusCommand(parsed, config);
      case "plan":
        return runPlanCommand(parsed, config);
    }
  } catch (error) {
    logger.error("command_failed", { command: parsed.command, error: errorMessage(error) });
    return EXIT_FATAL;
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
