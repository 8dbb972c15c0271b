import type { CrawlResult } from "../types";

export type RunStatus = "running" | "completed" | "failed";

export interface RunRecord {
  runId: string;
  directoryUrl: string;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
  error: string | null;
  siteCount: number;
}

export interface RunStore {
  startRun(runId: string, directoryUrl: string, startedAt: string): Promise<void>;
  /** `position` is the 1-based index of the site within its run. */
  recordResult(runId: string, position: number, result: CrawlResult): Promise<void>;
  finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string, error?: string): Promise<void>;
  listRuns(limit: number): Promise<RunRecord[]>;
  getRunResults(runId: string): Promise<CrawlResult[]>;
  close(): Promise<void>;
}
