import fs from "node:fs";
import path from "node:path";
import { ConfigError, errorMessage } from "../core/errors";
import type { ConfigOverrides, CrawlerConfig, OutputFormat } from "./types";

const DEFAULT_CONFIG: Readonly<CrawlerConfig> = Object.freeze({
  directoryUrl: "https://sverigestidskrifter.se/vara-medlemmar/",
  contactHints: Object.freeze(["kontakt", "contact", "om", "about", "annonser", "editor", "redaktion"]),
  userAgent: "ContactFinder/1.0 (+local script)",
  requestTimeoutMs: 15_000,
  delayMs: 1_000,
  maxContactPages: 8,
  outputPath: "sverigestidskrifter_contacts.csv",
  outputFormat: "csv",
  storePath: "data/runs.sqlite",
  ignoreHttpsErrors: false,
  serverHost: "0.0.0.0",
  serverPort: 8000,
});

const CONFIG_KEYS: ReadonlyArray<keyof CrawlerConfig> = [
  "directoryUrl",
  "contactHints",
  "userAgent",
  "requestTimeoutMs",
  "delayMs",
  "maxContactPages",
  "outputPath",
  "outputFormat",
  "storePath",
  "ignoreHttpsErrors",
  "serverHost",
  "serverPort",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === "csv" || value === "jsonl";
}

function isConfigKey(key: string): key is keyof CrawlerConfig {
  return CONFIG_KEYS.some((candidate) => candidate === key);
}

/**
 * Checks the shape of untrusted overrides (a JSON config file or an HTTP
 * request body). Unknown keys are rejected so typos do not pass silently.
 */
export function parseOverrides(value: unknown, source: string): ConfigOverrides {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError([`${source} must be a JSON object`]);
  }

  const overrides: ConfigOverrides = {};
  const issues: string[] = [];

  for (const [key, raw] of Object.entries(value)) {
    if (!isConfigKey(key)) {
      issues.push(`${source}: unknown option "${key}"`);
      continue;
    }

    switch (key) {
      case "directoryUrl":
      case "userAgent":
      case "outputPath":
      case "storePath":
      case "serverHost":
        if (typeof raw === "string") {
          overrides[key] = raw;
        } else {
          issues.push(`${source}: ${key} must be a string`);
        }
        break;
      case "requestTimeoutMs":
      case "delayMs":
      case "maxContactPages":
      case "serverPort":
        if (typeof raw === "number" && Number.isFinite(raw)) {
          overrides[key] = raw;
        } else {
          issues.push(`${source}: ${key} must be a number`);
        }
        break;
      case "ignoreHttpsErrors":
        if (typeof raw === "boolean") {
          overrides.ignoreHttpsErrors = raw;
        } else {
          issues.push(`${source}: ignoreHttpsErrors must be a boolean`);
        }
        break;
      case "outputFormat":
        if (isOutputFormat(raw)) {
          overrides.outputFormat = raw;
        } else {
          issues.push(`${source}: outputFormat must be "csv" or "jsonl"`);
        }
        break;
      case "contactHints":
        if (Array.isArray(raw) && raw.every((hint): hint is string => typeof hint === "string")) {
          overrides.contactHints = raw;
        } else {
          issues.push(`${source}: contactHints must be an array of strings`);
        }
        break;
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return overrides;
}

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError([`Config file not found: ${absolutePath}`]);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError([`Config file is not valid JSON: ${absolutePath} (${errorMessage(error)})`]);
  }
  return parseOverrides(parsed, absolutePath);
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: readonly string[]): readonly string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function isAbsoluteUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export function validateConfig(config: CrawlerConfig): CrawlerConfig {
  const issues: string[] = [];

  if (!(config.delayMs >= 0)) {
    issues.push("delayMs must be >= 0");
  }
  if (!(config.requestTimeoutMs > 0)) {
    issues.push("requestTimeoutMs must be > 0");
  }
  if (!Number.isInteger(config.maxContactPages) || config.maxContactPages < 0) {
    issues.push("maxContactPages must be an integer >= 0");
  }
  if (!Number.isInteger(config.serverPort) || config.serverPort < 0 || config.serverPort > 65_535) {
    issues.push("serverPort must be an integer between 0 and 65535");
  }
  if (!isAbsoluteUrl(config.directoryUrl)) {
    issues.push(`directoryUrl is not an absolute URL: ${config.directoryUrl}`);
  }
  if (config.outputPath.trim().length === 0) {
    issues.push("outputPath must not be empty");
  }

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    ...config,
    contactHints: config.contactHints.map((hint) => hint.toLowerCase()).filter((hint) => hint.length > 0),
  };
}

export function applyOverrides(config: CrawlerConfig, overrides: ConfigOverrides): CrawlerConfig {
  return validateConfig({ ...config, ...overrides });
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const fileConfig = readConfigFile(configPath);
  const merged: CrawlerConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
  };

  return validateConfig({
    ...merged,
    directoryUrl: env.DIRECTORY_URL ?? merged.directoryUrl,
    contactHints: toList(env.CONTACT_HINTS, merged.contactHints),
    userAgent: env.USER_AGENT ?? merged.userAgent,
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    delayMs: toInt(env.DELAY_MS, merged.delayMs),
    maxContactPages: toInt(env.MAX_CONTACT_PAGES, merged.maxContactPages),
    outputPath: env.OUTPUT_PATH ?? merged.outputPath,
    outputFormat: isOutputFormat(env.OUTPUT_FORMAT) ? env.OUTPUT_FORMAT : merged.outputFormat,
    storePath: env.STORE_PATH ?? merged.storePath,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    serverHost: env.HOST ?? merged.serverHost,
    serverPort: toInt(env.PORT, merged.serverPort),
  });
}

export { DEFAULT_CONFIG };
