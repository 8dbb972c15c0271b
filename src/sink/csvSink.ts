import type { CrawlResult } from "../types";
import { BaseFileSink } from "./baseSink";

export const CSV_COLUMNS = ["site", "emails", "phones", "contact_pages_checked", "error"] as const;

/** Separator for list-valued columns; downstream consumers split on it. */
export const LIST_DELIMITER = "; ";

const LINE_TERMINATOR = "\r\n";

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvRow(result: CrawlResult): string[] {
  return [
    result.site,
    result.emails.join(LIST_DELIMITER),
    result.phones.join(LIST_DELIMITER),
    result.contactPagesChecked.join(LIST_DELIMITER),
    result.error ?? "",
  ];
}

export class CsvSink extends BaseFileSink {
  serialize(results: readonly CrawlResult[]): string {
    const lines = [CSV_COLUMNS.join(","), ...results.map((result) => toCsvRow(result).map(escapeCsvField).join(","))];
    return lines.map((line) => `${line}${LINE_TERMINATOR}`).join("");
  }
}
