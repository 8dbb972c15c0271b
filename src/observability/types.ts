export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  site?: string;
  url?: string;
  index?: number;
  total?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "sites_discovered"
  | "sites_ok"
  | "sites_partial"
  | "sites_failed"
  | "contact_pages_fetched"
  | "contact_pages_failed";

export type MetricTimerName = "page_fetch_ms" | "site_ms";
