import { type ConfigOverrides, type CrawlerConfig, applyOverrides } from "../config";
import { errorMessage } from "../core/errors";
import type { FetchLike } from "../core/fetch";
import { runCrawl } from "../crawl";
import { type Logger, MetricsRegistry, createRunId } from "../observability";
import { type ResultSink, createSink } from "../sink";
import type { RunStore } from "../store";
import type { CrawlResult, CrawlStatusSnapshot } from "../types";
import { StatusTracker } from "./statusTracker";

export type StartOutcome = { started: true; runId: string } | { started: false; reason: "already_running" };

export interface RunSummary {
  runId: string;
  config: CrawlerConfig;
  results: CrawlResult[];
  outputLocation: string;
  metrics: MetricsRegistry;
}

export interface CrawlRunnerDeps {
  baseConfig: CrawlerConfig;
  store: RunStore;
  logger: Logger;
  tracker?: StatusTracker;
  fetchFn?: FetchLike;
  sinkFactory?: (config: CrawlerConfig, runId: string) => ResultSink;
  /** Extra per-site listener, called after the tracker and store are updated. */
  onProgress?: (completed: number, total: number, result: CrawlResult) => void;
  onComplete?: (summary: RunSummary) => void;
}

interface ActiveRun {
  runId: string;
  controller: AbortController;
  task: Promise<void>;
}

/**
 * Runs at most one crawl at a time in the background and publishes its
 * progress through a StatusTracker. The run's promise is kept as a task
 * handle so callers can await or cancel it.
 */
export class CrawlRunner {
  private readonly deps: CrawlRunnerDeps;
  private readonly tracker: StatusTracker;
  private active: ActiveRun | undefined;

  constructor(deps: CrawlRunnerDeps) {
    this.deps = deps;
    this.tracker = deps.tracker ?? new StatusTracker();
  }

  /** Throws ConfigError, before touching any state, when overrides are invalid. */
  start(overrides: ConfigOverrides = {}): StartOutcome {
    if (this.tracker.snapshot().running) {
      return { started: false, reason: "already_running" };
    }

    const config = applyOverrides(this.deps.baseConfig, overrides);
    const runId = createRunId();
    const controller = new AbortController();
    this.tracker.start(runId);
    const task = this.execute(runId, config, controller.signal);
    this.active = { runId, controller, task };
    return { started: true, runId };
  }

  cancel(): boolean {
    if (!this.active || !this.tracker.isRunning()) {
      return false;
    }
    this.active.controller.abort();
    return true;
  }

  async wait(): Promise<void> {
    await this.active?.task;
  }

  status(): CrawlStatusSnapshot {
    return this.tracker.snapshot();
  }

  private async execute(runId: string, config: CrawlerConfig, signal: AbortSignal): Promise<void> {
    const { store } = this.deps;
    const logger = this.deps.logger.withRunId(runId).child("crawl");
    const metrics = new MetricsRegistry();
    let summary: RunSummary | undefined;

    try {
      const sink = (this.deps.sinkFactory ?? createSink)(config, runId);
      await store.startRun(runId, config.directoryUrl, new Date().toISOString());
      const results = await runCrawl(
        { config, logger, metrics, fetchFn: this.deps.fetchFn },
        {
          signal,
          onProgress: async (completed, total, result) => {
            this.tracker.update(completed, total, result);
            await store.recordResult(runId, completed, result);
            this.deps.onProgress?.(completed, total, result);
          },
        },
      );

      await sink.writeResults(results);
      await store.finishRun(runId, "completed", new Date().toISOString());
      logger.info("crawl_output_written", { location: sink.location, sites: results.length });
      this.tracker.finish();
      summary = { runId, config, results, outputLocation: sink.location, metrics };
    } catch (error) {
      const message = errorMessage(error);
      logger.error("crawl_run_failed", { error: message });
      this.tracker.setError(message);
      try {
        await store.finishRun(runId, "failed", new Date().toISOString(), message);
      } catch (storeError) {
        logger.error("crawl_run_store_failed", { error: errorMessage(storeError) });
      }
    }

    if (summary) {
      this.deps.onComplete?.(summary);
    }
  }
}
