import type { AcquisitionState } from "./enums.js";

export interface AcquisitionRequest {
  readonly url: string;
  readonly outputDirectory: string;
  readonly headless: boolean;
}

/**
 * Result of one strategy. A strategy never throws: anything that goes wrong
 * is folded into a `skipped` outcome.
 */
export type StrategyOutcome<T> =
  | { status: "produced"; artifact: T }
  | { status: "skipped"; reason: string; error?: unknown };

export type DownloadArtifact = { filePath: string };

export type ScreenshotArtifact = {
  directory: string;
  /** Ordered by page index; failed captures leave gaps in the numbering. */
  filePaths: string[];
  failedPages: number[];
};

export type TextArtifact = { filePath: string; characters: number };

export interface StrategyOutcomes {
  download?: StrategyOutcome<DownloadArtifact>;
  screenshots?: StrategyOutcome<ScreenshotArtifact>;
  text?: StrategyOutcome<TextArtifact>;
}

export interface AcquisitionResult {
  succeeded: boolean;
  title: string | null;
  sanitizedTitle: string | null;
  downloadedFilePath?: string;
  savedTextPath?: string;
  savedScreenshotPaths: string[];
  outcomes: StrategyOutcomes;
  /** Set when the run ended before any strategy could start. */
  failure?: string;
}

export interface AcquisitionSettings {
  navigationTimeoutMs: number;
  viewerTimeoutMs: number;
  downloadSettleMs: number;
  pageSettleMs: number;
  maxTitleLength: number;
  /** Upper bound on captured pages; undefined means every rendered page. */
  maxPages?: number;
  viewerSelectors: readonly string[];
  textContainerSelectors: readonly string[];
  downloadSelectors: readonly string[];
  pageSelectors: readonly string[];
  titleSelectors: readonly string[];
}

export interface AcquisitionHooks {
  onStateChange?: (state: AcquisitionState) => void;
  onPagesFound?: (total: number) => void;
  onPageCaptured?: (pageNumber: number, total: number, filePath: string | null) => void;
}

export function produced<T>(artifact: T): StrategyOutcome<T> {
  return { status: "produced", artifact };
}

export function skipped<T>(reason: string, error?: unknown): StrategyOutcome<T> {
  return error === undefined
    ? { status: "skipped", reason }
    : { status: "skipped", reason, error };
}
