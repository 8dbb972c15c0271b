import type { CrawlResult } from "../types";

export interface ResultSink {
  /** Where the results end up, for messages such as "Wrote <location>". */
  readonly location: string;
  writeResults(results: readonly CrawlResult[]): Promise<void>;
}
