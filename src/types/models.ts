/**
 * `complete`: home page and every contact page fetched.
 * `partial`: home page fetched, at least one contact page failed.
 * `failed`: home page fetch failed; only `site` and `error` carry data.
 */
export type SiteOutcome = "complete" | "partial" | "failed";

export interface CrawlResult {
  site: string;
  emails: string[];
  phones: string[];
  contactPagesChecked: string[];
  failedContactPages: string[];
  outcome: SiteOutcome;
  error?: string;
}

export interface ExtractedContacts {
  emails: string[];
  phones: string[];
}

export interface CrawlStatus {
  runId: string | null;
  total: number;
  completed: number;
  currentSite: string | null;
  startedAt: string | null;
  finishedAt: string | null;
  results: CrawlResult[];
  running: boolean;
  error: string | null;
}

type DeepReadonly<T> = T extends (infer Item)[]
  ? ReadonlyArray<DeepReadonly<Item>>
  : T extends object
    ? { readonly [Key in keyof T]: DeepReadonly<T[Key]> }
    : T;

export type CrawlResultSnapshot = DeepReadonly<CrawlResult>;

export type CrawlStatusSnapshot = DeepReadonly<CrawlStatus>;

export type ProgressListener = (completed: number, total: number, result: CrawlResult) => void | Promise<void>;

export function failedResult(site: string, error: string): CrawlResult {
  return {
    site,
    emails: [],
    phones: [],
    contactPagesChecked: [],
    failedContactPages: [],
    outcome: "failed",
    error,
  };
}
