import type { CrawlerConfig } from "../config";
import { CsvSink } from "./csvSink";
import { LocalJsonlSink } from "./localJsonlSink";
import type { ResultSink } from "./types";

export function createSink(config: Pick<CrawlerConfig, "outputPath" | "outputFormat">, runId: string): ResultSink {
  switch (config.outputFormat) {
    case "csv":
      return new CsvSink(config.outputPath);
    case "jsonl":
      return new LocalJsonlSink(config.outputPath, runId);
  }
}

export * from "./baseSink";
export * from "./csvSink";
export * from "./localJsonlSink";
export * from "./types";
