import type { CrawlResult } from "../types";
import type { RunRecord, RunStatus, RunStore } from "./types";

export class InMemoryRunStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();
  private readonly results = new Map<string, Map<number, CrawlResult>>();

  async startRun(runId: string, directoryUrl: string, startedAt: string): Promise<void> {
    this.runs.set(runId, {
      runId,
      directoryUrl,
      startedAt,
      finishedAt: null,
      status: "running",
      error: null,
      siteCount: 0,
    });
    this.results.set(runId, new Map());
  }

  async recordResult(runId: string, position: number, result: CrawlResult): Promise<void> {
    const byPosition = this.results.get(runId) ?? new Map<number, CrawlResult>();
    byPosition.set(position, structuredClone(result));
    this.results.set(runId, byPosition);

    const run = this.runs.get(runId);
    if (run) {
      run.siteCount = byPosition.size;
    }
  }

  async finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string, error?: string): Promise<void> {
    const run = this.runs.get(runId);
    if (!run) {
      return;
    }
    run.status = status;
    run.finishedAt = finishedAt;
    run.error = error ?? null;
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    return [...this.runs.values()]
      .sort((left, right) => right.startedAt.localeCompare(left.startedAt))
      .slice(0, limit)
      .map((run) => ({ ...run }));
  }

  async getRunResults(runId: string): Promise<CrawlResult[]> {
    const byPosition = this.results.get(runId);
    if (!byPosition) {
      return [];
    }
    return [...byPosition.entries()].sort(([left], [right]) => left - right).map(([, result]) => structuredClone(result));
  }

  async close(): Promise<void> {
    return;
  }
}
