import type { CrawlResult, CrawlStatus, CrawlStatusSnapshot } from "../types";

function idleStatus(): CrawlStatus {
  return {
    runId: null,
    total: 0,
    completed: 0,
    currentSite: null,
    startedAt: null,
    finishedAt: null,
    results: [],
    running: false,
    error: null,
  };
}

function copyResult(result: CrawlResult): CrawlResult {
  return {
    ...result,
    emails: [...result.emails],
    phones: [...result.phones],
    contactPagesChecked: [...result.contactPagesChecked],
    failedContactPages: [...result.failedContactPages],
  };
}

function freezeResult(result: CrawlResult): CrawlResult {
  Object.freeze(result.emails);
  Object.freeze(result.phones);
  Object.freeze(result.contactPagesChecked);
  Object.freeze(result.failedContactPages);
  return Object.freeze(result);
}

/**
 * Sole owner of the live crawl status. Every method runs to completion
 * synchronously, so a reader on the event loop never sees a half-applied
 * update. Readers only ever get frozen copies.
 */
export class StatusTracker {
  private status: CrawlStatus = idleStatus();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  start(runId: string | null = null): void {
    this.status = {
      ...idleStatus(),
      runId,
      running: true,
      startedAt: this.now().toISOString(),
    };
  }

  /**
   * Stores `result` in slot `completed - 1`; repeating a slot overwrites it.
   * `completed` is 1-based, so anything below 1 is ignored.
   */
  update(completed: number, total: number, result: CrawlResult): void {
    if (this.status.finishedAt !== null || !Number.isInteger(completed) || completed < 1) {
      return;
    }

    this.status.completed = completed;
    this.status.total = total;
    this.status.currentSite = result.site;

    const copy = copyResult(result);
    if (this.status.results.length < completed) {
      this.status.results.push(copy);
    } else {
      this.status.results[completed - 1] = copy;
    }
  }

  finish(): void {
    this.status.running = false;
    this.status.finishedAt = this.now().toISOString();
    this.status.currentSite = null;
  }

  setError(message: string): void {
    this.status.error = message;
    this.status.running = false;
    this.status.finishedAt = this.now().toISOString();
    this.status.currentSite = null;
  }

  isRunning(): boolean {
    return this.status.running;
  }

  snapshot(): CrawlStatusSnapshot {
    return Object.freeze({
      ...this.status,
      results: Object.freeze(this.status.results.map((result) => freezeResult(copyResult(result)))),
    });
  }
}
