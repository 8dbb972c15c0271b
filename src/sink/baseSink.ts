import fs from "node:fs";
import path from "node:path";
import type { CrawlResult } from "../types";
import type { ResultSink } from "./types";

export abstract class BaseFileSink implements ResultSink {
  readonly location: string;

  constructor(outputPath: string) {
    this.location = path.resolve(outputPath);
  }

  abstract serialize(results: readonly CrawlResult[]): string;

  async writeResults(results: readonly CrawlResult[]): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    await fs.promises.writeFile(this.location, this.serialize(results), "utf-8");
  }
}
