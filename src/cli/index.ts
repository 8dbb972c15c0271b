import { type ConfigOverrides, type CrawlerConfig, type OutputFormat, applyOverrides, loadConfig } from "../config";
import { createRunId, Logger } from "../observability";
import { closeServer, createApp, listen } from "../server";
import { CrawlRunner } from "../status";
import { createStore } from "../store";
import type { CrawlResult } from "../types";

export type CommandName = "crawl" | "serve" | "history";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  overrides: ConfigOverrides;
  useStore: boolean;
  limit?: number;
}

const HELP_TEXT = `
Usage:
  contact-crawler <command> [options]

Commands:
  crawl     Crawl every member site and write the results
  serve     Start the HTTP status/control endpoint
  history   List recent runs from the run store

Options:
  --config <path>              Optional path to JSON config file
  --directory-url <url>        Member directory page to start from
  --delay <seconds>            Delay in seconds between requests
  --timeout <seconds>          Timeout in seconds for each request
  --max-contact-pages <n>      Contact pages examined per site
  --output <path>              Output file path
  --format <csv|jsonl>         Output format
  --ignore-https-errors        Ignore TLS certificate errors (use only when required)
  --no-store                   Do not record the run in the run store
  --host <host>                Listen address (serve)
  --port <n>                   Listen port (serve)
  --limit <n>                  Number of runs to list (history)
  -h, --help                   Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "crawl" || raw === "serve" || raw === "history") {
    return raw;
  }
  return undefined;
}

function readOption(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  if (index >= 0 && argv[index + 1] !== undefined) {
    return argv[index + 1];
  }
  return undefined;
}

function readNumber(argv: string[], name: string): number | undefined {
  const raw = readOption(argv, name);
  const parsed = raw !== undefined ? Number(raw) : Number.NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readSeconds(argv: string[], name: string): number | undefined {
  const seconds = readNumber(argv, name);
  return seconds !== undefined ? Math.round(seconds * 1000) : undefined;
}

function readFormat(argv: string[]): OutputFormat | undefined {
  const raw = readOption(argv, "--format");
  return raw === "csv" || raw === "jsonl" ? raw : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const overrides: ConfigOverrides = {};
  const directoryUrl = readOption(argv, "--directory-url");
  const delayMs = readSeconds(argv, "--delay");
  const requestTimeoutMs = readSeconds(argv, "--timeout");
  const maxContactPages = readNumber(argv, "--max-contact-pages");
  const outputPath = readOption(argv, "--output");
  const outputFormat = readFormat(argv);
  const serverHost = readOption(argv, "--host");
  const serverPort = readNumber(argv, "--port");

  if (directoryUrl !== undefined) overrides.directoryUrl = directoryUrl;
  if (delayMs !== undefined) overrides.delayMs = delayMs;
  if (requestTimeoutMs !== undefined) overrides.requestTimeoutMs = requestTimeoutMs;
  if (maxContactPages !== undefined) overrides.maxContactPages = maxContactPages;
  if (outputPath !== undefined) overrides.outputPath = outputPath;
  if (outputFormat !== undefined) overrides.outputFormat = outputFormat;
  if (serverHost !== undefined) overrides.serverHost = serverHost;
  if (serverPort !== undefined) overrides.serverPort = serverPort;
  if (argv.includes("--ignore-https-errors")) overrides.ignoreHttpsErrors = true;

  const limit = readNumber(argv, "--limit");
  return {
    command,
    configPath: readOption(argv, "--config"),
    overrides,
    useStore: !argv.includes("--no-store"),
    limit: limit !== undefined && limit > 0 ? Math.floor(limit) : undefined,
  };
}

export function formatProgressLine(completed: number, total: number, result: CrawlResult): string {
  const prefix = `[${completed}/${total}] ${result.site} ->`;
  if (result.error !== undefined) {
    return `${prefix} ERROR: ${result.error}`;
  }
  const line = `${prefix} ${result.emails.length} emails, ${result.phones.length} phones`;
  return result.failedContactPages.length > 0
    ? `${line} (${result.failedContactPages.length} contact pages failed)`
    : line;
}

async function runCrawlCommand(config: CrawlerConfig, parsed: ParsedCliArgs, logger: Logger): Promise<number> {
  const store = createStore(config, parsed.useStore);
  const runner = new CrawlRunner({
    baseConfig: config,
    store,
    logger,
    onProgress: (completed, total, result) => {
      console.log(formatProgressLine(completed, total, result));
    },
    onComplete: (summary) => {
      summary.metrics.printSummary();
      console.log(`Done. Wrote ${summary.outputLocation}`);
    },
  });

  const abort = (): void => {
    runner.cancel();
  };
  process.once("SIGINT", abort);

  try {
    runner.start();
    await runner.wait();
  } finally {
    process.off("SIGINT", abort);
    await store.close();
  }

  const status = runner.status();
  if (status.error !== null) {
    console.error(`fatal: ${status.error}`);
    return 1;
  }
  return 0;
}

async function runServeCommand(config: CrawlerConfig, parsed: ParsedCliArgs, logger: Logger): Promise<number> {
  const store = createStore(config, parsed.useStore);
  const runner = new CrawlRunner({ baseConfig: config, store, logger });
  const app = createApp({ runner, store, logger: logger.child("server") });
  const server = await listen(app, config.serverHost, config.serverPort);
  logger.info("server_listening", { host: config.serverHost, port: config.serverPort });
  console.log(`UI running on http://localhost:${config.serverPort}`);

  await new Promise<void>((resolve) => {
    process.once("SIGINT", () => resolve());
    process.once("SIGTERM", () => resolve());
  });

  logger.info("server_shutting_down");
  runner.cancel();
  await closeServer(server);
  await runner.wait();
  await store.close();
  return 0;
}

async function runHistoryCommand(config: CrawlerConfig, parsed: ParsedCliArgs): Promise<number> {
  const store = createStore(config);
  try {
    const runs = await store.listRuns(parsed.limit ?? 10);
    if (runs.length === 0) {
      console.log("No runs recorded.");
      return 0;
    }
    for (const run of runs) {
      const finished = run.finishedAt ?? "-";
      const suffix = run.error ? ` error=${run.error}` : "";
      console.log(`${run.runId} ${run.status} sites=${run.siteCount} started=${run.startedAt} finished=${finished}${suffix}`);
    }
    return 0;
  } finally {
    await store.close();
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyOverrides(loadConfig(parsed.configPath), parsed.overrides);
  const logger = new Logger({ component: "cli", runId: createRunId() });

  logger.info("command_start", {
    command: parsed.command,
    url: config.directoryUrl,
    delayMs: config.delayMs,
    requestTimeoutMs: config.requestTimeoutMs,
    maxContactPages: config.maxContactPages,
    outputPath: config.outputPath,
    outputFormat: config.outputFormat,
    useStore: parsed.useStore,
  });

  switch (parsed.command) {
    case "crawl":
      return runCrawlCommand(config, parsed, logger);
    case "serve":
      return runServeCommand(config, parsed, logger);
    case "history":
      return runHistoryCommand(config, parsed);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
