import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import type { AcquisitionSettings } from "../types/acquisition.js";
import {
  DEFAULT_DOWNLOAD_SETTLE_MS,
  DEFAULT_MAX_TITLE_LENGTH,
  DEFAULT_NAVIGATION_TIMEOUT_MS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PAGE_SETTLE_MS,
  DEFAULT_USER_AGENT,
  DEFAULT_VIEWER_TIMEOUT_MS,
  DEFAULT_WINDOW_SIZE,
  DOWNLOAD_SELECTORS,
  PAGE_SELECTORS,
  TEXT_CONTAINER_SELECTORS,
  TITLE_SELECTORS,
  VIEWER_SELECTORS,
} from "../types/constants.js";
import { ConfigError } from "../types/errors.js";

dotenvConfig();

const ConfigSchema = z.object({
  outputDirectory: z.string().min(1),
  headless: z.boolean(),
  chromePath: z.string().min(1).optional(),
  userAgent: z.string().min(1),
  windowSize: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
  navigationTimeoutMs: z.number().int().positive(),
  viewerTimeoutMs: z.number().int().positive(),
  downloadSettleMs: z.number().int().nonnegative(),
  pageSettleMs: z.number().int().nonnegative(),
  maxPages: z.number().int().positive().optional(),
  maxTitleLength: z.number().int().positive(),
});

export type Config = z.infer<typeof ConfigSchema>;

function getEnvString(key: string, defaultValue: string): string;
function getEnvString(key: string): string | undefined;
function getEnvString(key: string, defaultValue?: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number;
function getEnvNumber(key: string): number | undefined;
function getEnvNumber(key: string, defaultValue?: number): number | undefined {
  const value = getEnvString(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be an integer`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = getEnvString(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseBooleanFlag(value);
  if (parsed === undefined) {
    throw new ConfigError(`Environment variable ${key} must be true or false`);
  }
  return parsed;
}

export function parseBooleanFlag(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "n"].includes(normalized)) {
    return false;
  }
  return undefined;
}

/**
 * Parse a `WIDTHxHEIGHT` (or `WIDTH,HEIGHT`) window size.
 */
export function parseWindowSize(value: string): { width: number; height: number } {
  const match = value.trim().match(/^(\d+)\s*[x,]\s*(\d+)$/i);
  if (!match?.[1] || !match[2]) {
    throw new ConfigError(`Window size must look like 1920x1080, got "${value}"`);
  }
  return { width: parseInt(match[1], 10), height: parseInt(match[2], 10) };
}

let cached: Config | null = null;

export function loadConfig(): Config {
  if (cached) {
    return cached;
  }

  const windowSize = getEnvString("DOC_DL_WINDOW_SIZE");
  const rawConfig = {
    outputDirectory: getEnvString("DOC_DL_OUTPUT_DIR", DEFAULT_OUTPUT_DIR),
    headless: getEnvBoolean("DOC_DL_HEADLESS", true),
    chromePath: getEnvString("DOC_DL_CHROME_PATH"),
    userAgent: getEnvString("DOC_DL_USER_AGENT", DEFAULT_USER_AGENT),
    windowSize: windowSize ? parseWindowSize(windowSize) : DEFAULT_WINDOW_SIZE,
    navigationTimeoutMs: getEnvNumber(
      "DOC_DL_NAVIGATION_TIMEOUT_MS",
      DEFAULT_NAVIGATION_TIMEOUT_MS,
    ),
    viewerTimeoutMs: getEnvNumber("DOC_DL_VIEWER_TIMEOUT_MS", DEFAULT_VIEWER_TIMEOUT_MS),
    downloadSettleMs: getEnvNumber(
      "DOC_DL_DOWNLOAD_SETTLE_MS",
      DEFAULT_DOWNLOAD_SETTLE_MS,
    ),
    pageSettleMs: getEnvNumber("DOC_DL_PAGE_SETTLE_MS", DEFAULT_PAGE_SETTLE_MS),
    maxPages: getEnvNumber("DOC_DL_MAX_PAGES"),
    maxTitleLength: getEnvNumber("DOC_DL_MAX_TITLE_LENGTH", DEFAULT_MAX_TITLE_LENGTH),
  };

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  cached = parsed.data;
  return cached;
}

export function resetConfig(): void {
  cached = null;
}

export function toAcquisitionSettings(
  config: Config,
  overrides: { maxPages?: number } = {},
): AcquisitionSettings {
  return {
    navigationTimeoutMs: config.navigationTimeoutMs,
    viewerTimeoutMs: config.viewerTimeoutMs,
    downloadSettleMs: config.downloadSettleMs,
    pageSettleMs: config.pageSettleMs,
    maxTitleLength: config.maxTitleLength,
    maxPages: overrides.maxPages ?? config.maxPages,
    viewerSelectors: VIEWER_SELECTORS,
    textContainerSelectors: TEXT_CONTAINER_SELECTORS,
    downloadSelectors: DOWNLOAD_SELECTORS,
    pageSelectors: PAGE_SELECTORS,
    titleSelectors: TITLE_SELECTORS,
  };
}
