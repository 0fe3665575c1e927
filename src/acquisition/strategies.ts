import fs from "fs";
import path from "path";
import type { BrowserSession } from "../browser/types.js";
import {
  produced,
  skipped,
  type AcquisitionHooks,
  type AcquisitionRequest,
  type AcquisitionSettings,
  type DownloadArtifact,
  type ScreenshotArtifact,
  type StrategyOutcome,
  type TextArtifact,
} from "../types/acquisition.js";
import { NoContentFoundError, errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { cleanText, writeArtifact } from "./helpers.js";

export interface StrategyContext {
  session: BrowserSession;
  request: AcquisitionRequest;
  sanitizedTitle: string;
  settings: AcquisitionSettings;
  hooks: AcquisitionHooks;
}

export type Strategy<T> = (context: StrategyContext) => Promise<StrategyOutcome<T>>;

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function screenshotPath(
  outputDirectory: string,
  sanitizedTitle: string,
  pageNumber: number,
): string {
  return path.join(outputDirectory, sanitizedTitle, `page_${pageNumber}.png`);
}

export function textPath(outputDirectory: string, sanitizedTitle: string): string {
  return path.join(outputDirectory, `${sanitizedTitle}.txt`);
}

/**
 * Strategy A: click the site's own download control, if there is one, and
 * wait briefly for the browser to finish a download. The file is left where
 * the browser saved it.
 */
export const tryDownloadControl: Strategy<DownloadArtifact> = async ({
  session,
  request,
  settings,
}) => {
  const control = await session.findFirst(settings.downloadSelectors);
  if (!control) {
    logger.info("[Download] No download button found, skipping");
    return skipped("no download control on the page");
  }

  logger.info("[Download] Download button found, clicking...");
  fs.mkdirSync(request.outputDirectory, { recursive: true });
  const filePath = await session.downloadVia(
    control,
    request.outputDirectory,
    settings.downloadSettleMs,
  );

  if (!filePath) {
    logger.info(
      `[Download] No download completed within ${settings.downloadSettleMs}ms`,
    );
    return skipped("click did not trigger a download");
  }

  logger.info(`[Download] Saved: ${filePath}`);
  return produced({ filePath });
};

/**
 * Strategy B: screenshot every rendered page element. Pages keep their DOM
 * position in the file name, so a page that fails to capture leaves a gap
 * (page_1.png, page_3.png) instead of shifting the rest down.
 */
export const captureScreenshots: Strategy<ScreenshotArtifact> = async ({
  session,
  request,
  sanitizedTitle,
  settings,
  hooks,
}) => {
  const found = await session.findAll(settings.pageSelectors);
  if (found.length === 0) {
    const error = new NoContentFoundError("No document pages found for screenshot");
    logger.warn(`[Screenshot] ${error.message}`);
    return skipped(error.message, error);
  }

  const pages =
    settings.maxPages !== undefined ? found.slice(0, settings.maxPages) : found;
  const total = pages.length;
  logger.info(`[Screenshot] Capturing ${total} of ${found.length} pages...`);
  hooks.onPagesFound?.(total);

  const directory = path.join(request.outputDirectory, sanitizedTitle);
  const filePaths: string[] = [];
  const failedPages: number[] = [];

  for (const [index, page] of pages.entries()) {
    const pageNumber = index + 1;
    try {
      await page.scrollIntoView();
      await sleep(settings.pageSettleMs);
      const image = await page.screenshot();
      const filePath = writeArtifact(
        screenshotPath(request.outputDirectory, sanitizedTitle, pageNumber),
        image,
      );
      filePaths.push(filePath);
      logger.debug(`[Screenshot] Saved page ${pageNumber}`);
      hooks.onPageCaptured?.(pageNumber, total, filePath);
    } catch (error) {
      failedPages.push(pageNumber);
      logger.warn(
        `[Screenshot] Error capturing page ${pageNumber}: ${errorMessage(error)}`,
      );
      hooks.onPageCaptured?.(pageNumber, total, null);
    }
  }

  if (filePaths.length === 0) {
    return skipped(`none of the ${total} pages could be captured`);
  }

  logger.info(`[Screenshot] ${filePaths.length} screenshots saved to: ${directory}`);
  return produced({ directory, filePaths, failedPages });
};

/**
 * Strategy C: save the viewer's visible text. An empty viewer writes no file.
 */
export const extractText: Strategy<TextArtifact> = async ({
  session,
  request,
  sanitizedTitle,
  settings,
}) => {
  logger.info("[Text] Extracting text content...");
  const parts = await session.collectText(
    settings.textContainerSelectors,
    settings.pageSelectors,
  );
  const text = cleanText(parts.join("\n"));

  if (!text) {
    logger.info("[Text] No text content found");
    return skipped("viewer contains no text");
  }

  const filePath = writeArtifact(
    textPath(request.outputDirectory, sanitizedTitle),
    `${text}\n`,
  );
  logger.info(`[Text] Text content saved to: ${filePath}`);
  return produced({ filePath, characters: text.length });
};
