import type { Server } from "node:http";
import path from "node:path";
import express, { type ErrorRequestHandler, type Express } from "express";
import { type ConfigOverrides, parseOverrides } from "../config";
import { ConfigError } from "../core/errors";
import type { Logger } from "../observability";
import type { CrawlRunner } from "../status";
import type { RunStore } from "../store";

const PROCESS_WIDE_OPTIONS = ["storePath", "serverHost", "serverPort"] as const;

const PUBLIC_DIR = path.resolve(__dirname, "..", "..", "public");

const DEFAULT_RUN_LIMIT = 20;
const MAX_RUN_LIMIT = 200;

export interface ServerDeps {
  runner: CrawlRunner;
  store: RunStore;
  logger: Logger;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function secondsToMs(value: unknown): unknown {
  const seconds = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof seconds === "number" && Number.isFinite(seconds) ? Math.round(seconds * 1000) : value;
}

/**
 * Maps the short payload keys older clients send (`directory_url`, `output`,
 * `delay` and `timeout` in seconds) onto config keys.
 */
function fromShortKeys(body: unknown): unknown {
  if (!isRecord(body)) {
    return body;
  }

  const translated: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    switch (key) {
      case "directory_url":
        translated.directoryUrl = value;
        break;
      case "output":
        translated.outputPath = value;
        break;
      case "delay":
        translated.delayMs = secondsToMs(value);
        break;
      case "timeout":
        translated.requestTimeoutMs = secondsToMs(value);
        break;
      default:
        translated[key] = value;
    }
  }
  return translated;
}

/** Options that only apply to a single run; process-wide settings are refused. */
export function parseRunOverrides(body: unknown): ConfigOverrides {
  const overrides = parseOverrides(fromShortKeys(body), "request body");
  const refused = PROCESS_WIDE_OPTIONS.filter((key) => overrides[key] !== undefined);
  if (refused.length > 0) {
    throw new ConfigError(refused.map((key) => `request body: ${key} cannot be changed per run`));
  }
  return overrides;
}

function parseLimit(raw: unknown): number {
  if (typeof raw !== "string") {
    return DEFAULT_RUN_LIMIT;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_RUN_LIMIT;
  }
  return Math.min(parsed, MAX_RUN_LIMIT);
}

export function createApp({ runner, store, logger }: ServerDeps): Express {
  const app = express();
  app.use(express.json());
  app.use(express.static(PUBLIC_DIR));

  app.get("/api/status", (_req, res) => {
    res.json(runner.status());
  });

  app.post("/api/start", (req, res) => {
    let overrides: ConfigOverrides;
    try {
      overrides = parseRunOverrides(req.body);
    } catch (error) {
      if (error instanceof ConfigError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      throw error;
    }

    try {
      const outcome = runner.start(overrides);
      if (!outcome.started) {
        res.status(409).json({ error: "Crawler already running" });
        return;
      }

      logger.info("server_crawl_started", { runId: outcome.runId });
      res.status(202).json({ status: "started", runId: outcome.runId });
    } catch (error) {
      if (error instanceof ConfigError) {
        res.status(400).json({ error: error.message, issues: error.issues });
        return;
      }
      throw error;
    }
  });

  app.post("/api/cancel", (_req, res) => {
    if (!runner.cancel()) {
      res.status(409).json({ error: "No crawl is running" });
      return;
    }
    logger.info("server_crawl_cancel_requested");
    res.status(202).json({ status: "cancelling" });
  });

  app.get("/api/runs", async (req, res) => {
    try {
      res.json(await store.listRuns(parseLimit(req.query.limit)));
    } catch (error) {
      logger.error("server_list_runs_failed", { error: String(error) });
      res.status(500).json({ error: "Failed to list runs" });
    }
  });

  app.get("/api/runs/:runId/results", async (req, res) => {
    try {
      res.json(await store.getRunResults(req.params.runId));
    } catch (error) {
      logger.error("server_run_results_failed", { runId: req.params.runId, error: String(error) });
      res.status(500).json({ error: "Failed to get run results" });
    }
  });

  const handleError: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: "Request body is not valid JSON" });
      return;
    }
    logger.error("server_request_failed", { error: String(error) });
    res.status(500).json({ error: "Internal server error" });
  };
  app.use(handleError);

  return app;
}

export function listen(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once("listening", () => resolve(server));
    server.once("error", reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
