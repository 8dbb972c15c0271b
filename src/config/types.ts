export type OutputFormat = "csv" | "jsonl";

export interface CrawlerConfig {
  directoryUrl: string;
  /** Lower-cased substrings looked for in link text and href. */
  contactHints: readonly string[];
  userAgent: string;
  requestTimeoutMs: number;
  /** Fixed pause before every contact page and after every site. */
  delayMs: number;
  maxContactPages: number;
  outputPath: string;
  outputFormat: OutputFormat;
  storePath: string;
  ignoreHttpsErrors: boolean;
  serverHost: string;
  serverPort: number;
}

export type ConfigOverrides = Partial<CrawlerConfig>;
