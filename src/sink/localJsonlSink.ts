import type { CrawlResult } from "../types";
import { BaseFileSink } from "./baseSink";

export class LocalJsonlSink extends BaseFileSink {
  private readonly runId: string;

  constructor(outputPath: string, runId: string) {
    super(outputPath);
    this.runId = runId;
  }

  serialize(results: readonly CrawlResult[]): string {
    if (results.length === 0) {
      return "";
    }
    return results.map((result) => JSON.stringify({ runId: this.runId, ...result })).join("\n") + "\n";
  }
}
