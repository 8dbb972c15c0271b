import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { CrawlResult, SiteOutcome } from "../types";
import type { RunRecord, RunStatus, RunStore } from "./types";

type RunRow = {
  runId: string;
  directoryUrl: string;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
  error: string | null;
  siteCount: number;
};

type SiteResultRow = {
  site: string;
  outcome: SiteOutcome;
  emails: string;
  phones: string;
  contactPagesChecked: string;
  failedContactPages: string;
  error: string | null;
};

const IN_MEMORY = ":memory:";

function parseList(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

export class SqliteRunStore implements RunStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, directoryUrl: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, directoryUrl, startedAt, finishedAt, status, error)
        VALUES (@runId, @directoryUrl, @startedAt, NULL, 'running', NULL)
        ON CONFLICT(runId) DO UPDATE SET
          directoryUrl = excluded.directoryUrl,
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running',
          error = NULL
      `,
      )
      .run({ runId, directoryUrl, startedAt });
  }

  async recordResult(runId: string, position: number, result: CrawlResult): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO site_results (
          runId, position, site, outcome, emails, phones,
          contactPagesChecked, failedContactPages, error
        )
        VALUES (
          @runId, @position, @site, @outcome, @emails, @phones,
          @contactPagesChecked, @failedContactPages, @error
        )
        ON CONFLICT(runId, position) DO UPDATE SET
          site = excluded.site,
          outcome = excluded.outcome,
          emails = excluded.emails,
          phones = excluded.phones,
          contactPagesChecked = excluded.contactPagesChecked,
          failedContactPages = excluded.failedContactPages,
          error = excluded.error
      `,
      )
      .run({
        runId,
        position,
        site: result.site,
        outcome: result.outcome,
        emails: JSON.stringify(result.emails),
        phones: JSON.stringify(result.phones),
        contactPagesChecked: JSON.stringify(result.contactPagesChecked),
        failedContactPages: JSON.stringify(result.failedContactPages),
        error: result.error ?? null,
      });
  }

  async finishRun(runId: string, status: Exclude<RunStatus, "running">, finishedAt: string, error?: string): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          finishedAt = @finishedAt,
          error = @error
        WHERE runId = @runId
      `,
      )
      .run({ runId, status, finishedAt, error: error ?? null });
  }

  async listRuns(limit: number): Promise<RunRecord[]> {
    const rows = this.db
      .prepare<{ limit: number }, RunRow>(
        `
        SELECT
          r.runId, r.directoryUrl, r.startedAt, r.finishedAt, r.status, r.error,
          (SELECT COUNT(*) FROM site_results s WHERE s.runId = r.runId) AS siteCount
        FROM runs r
        ORDER BY r.startedAt DESC
        LIMIT @limit
      `,
      )
      .all({ limit });

    return rows.map((row) => ({ ...row }));
  }

  async getRunResults(runId: string): Promise<CrawlResult[]> {
    const rows = this.db
      .prepare<{ runId: string }, SiteResultRow>(
        `
        SELECT site, outcome, emails, phones, contactPagesChecked, failedContactPages, error
        FROM site_results
        WHERE runId = @runId
        ORDER BY position ASC
      `,
      )
      .all({ runId });

    return rows.map((row) => {
      const result: CrawlResult = {
        site: row.site,
        emails: parseList(row.emails),
        phones: parseList(row.phones),
        contactPagesChecked: parseList(row.contactPagesChecked),
        failedContactPages: parseList(row.failedContactPages),
        outcome: row.outcome,
      };
      if (row.error !== null) {
        result.error = row.error;
      }
      return result;
    });
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        directoryUrl TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT,
        status TEXT NOT NULL,
        error TEXT
      );

      CREATE TABLE IF NOT EXISTS site_results (
        runId TEXT NOT NULL REFERENCES runs(runId),
        position INTEGER NOT NULL,
        site TEXT NOT NULL,
        outcome TEXT NOT NULL,
        emails TEXT NOT NULL,
        phones TEXT NOT NULL,
        contactPagesChecked TEXT NOT NULL,
        failedContactPages TEXT NOT NULL,
        error TEXT,
        PRIMARY KEY (runId, position)
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(startedAt);
    `);
  }
}
