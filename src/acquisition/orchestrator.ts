import type { BrowserSession, SessionFactory } from "../browser/types.js";
import {
  skipped,
  type AcquisitionHooks,
  type AcquisitionRequest,
  type AcquisitionResult,
  type AcquisitionSettings,
  type StrategyOutcome,
  type StrategyOutcomes,
} from "../types/acquisition.js";
import { AcquisitionState, StrategyName } from "../types/enums.js";
import {
  NavigationTimeoutError,
  SessionSetupError,
  errorMessage,
} from "../types/errors.js";
import { logger } from "../utils/logger.js";
import { sanitizeTitle } from "./helpers.js";
import {
  captureScreenshots,
  extractText,
  tryDownloadControl,
  type Strategy,
  type StrategyContext,
} from "./strategies.js";

export interface OrchestratorOptions {
  openSession: SessionFactory;
  settings: AcquisitionSettings;
  hooks?: AcquisitionHooks;
}

/**
 * Runs one document acquisition: open a browser, load the page, then try
 * the download control, page screenshots and text extraction in that order.
 *
 * Only a browser that cannot be started is thrown to the caller. Everything
 * else ends up in the returned result, and the browser is closed exactly
 * once however the run ends.
 */
export class AcquisitionOrchestrator {
  private state: AcquisitionState = AcquisitionState.Init;
  private activeSession: BrowserSession | null = null;
  private readonly hooks: AcquisitionHooks;

  constructor(private readonly options: OrchestratorOptions) {
    this.hooks = options.hooks ?? {};
  }

  get currentState(): AcquisitionState {
    return this.state;
  }

  async run(request: AcquisitionRequest): Promise<AcquisitionResult> {
    this.transition(AcquisitionState.Init);

    let session: BrowserSession;
    try {
      session = await this.options.openSession({ headless: request.headless });
    } catch (error) {
      this.transition(AcquisitionState.Done);
      if (error instanceof SessionSetupError) {
        throw error;
      }
      throw new SessionSetupError(
        `Could not start the browser: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.activeSession = session;
    try {
      return await this.acquire(session, request);
    } finally {
      this.transition(AcquisitionState.TearDown);
      await this.releaseSession();
      this.transition(AcquisitionState.Done);
    }
  }

  /**
   * Close the browser of a run that is still in progress. Safe to call at
   * any time; the run's own teardown will not close it a second time.
   */
  async shutdown(): Promise<void> {
    await this.releaseSession();
  }

  private async acquire(
    session: BrowserSession,
    request: AcquisitionRequest,
  ): Promise<AcquisitionResult> {
    const { settings } = this.options;

    this.transition(AcquisitionState.NavigatingToDocument);
    try {
      await session.navigate(request.url, settings.navigationTimeoutMs);
      const ready = await session.waitForAny(
        settings.viewerSelectors,
        settings.viewerTimeoutMs,
      );
      if (!ready) {
        throw new NavigationTimeoutError(
          `Document viewer did not appear within ${settings.viewerTimeoutMs}ms`,
        );
      }
    } catch (error) {
      logger.error(`[Navigate] ${errorMessage(error)}`);
      return {
        succeeded: false,
        title: null,
        sanitizedTitle: null,
        savedScreenshotPaths: [],
        outcomes: {},
        failure: errorMessage(error),
      };
    }

    const title = await this.readTitle(session);
    const sanitizedTitle = sanitizeTitle(title, settings.maxTitleLength);
    logger.info(`[Document] ${title || "(untitled)"}`);

    const context: StrategyContext = {
      session,
      request,
      sanitizedTitle,
      settings,
      hooks: this.hooks,
    };

    const outcomes: StrategyOutcomes = {};

    this.transition(AcquisitionState.StrategyA);
    outcomes.download = await this.attempt(
      StrategyName.Download,
      tryDownloadControl,
      context,
    );

    this.transition(AcquisitionState.StrategyB);
    outcomes.screenshots = await this.attempt(
      StrategyName.Screenshots,
      captureScreenshots,
      context,
    );

    this.transition(AcquisitionState.StrategyC);
    outcomes.text = await this.attempt(StrategyName.Text, extractText, context);

    return summarize(title, sanitizedTitle, outcomes);
  }

  private async attempt<T>(
    name: StrategyName,
    strategy: Strategy<T>,
    context: StrategyContext,
  ): Promise<StrategyOutcome<T>> {
    try {
      return await strategy(context);
    } catch (error) {
      logger.warn(`[${name}] Strategy failed: ${errorMessage(error)}`);
      return skipped(`failed: ${errorMessage(error)}`, error);
    }
  }

  private async readTitle(session: BrowserSession): Promise<string> {
    try {
      return (await session.title(this.options.settings.titleSelectors)).trim();
    } catch (error) {
      logger.warn(`[Document] Could not read title: ${errorMessage(error)}`);
      return "";
    }
  }

  private async releaseSession(): Promise<void> {
    const session = this.activeSession;
    this.activeSession = null;
    if (!session) {
      return;
    }
    try {
      await session.close();
    } catch (error) {
      logger.warn(`[Browser] Error closing browser: ${errorMessage(error)}`);
    }
  }

  private transition(next: AcquisitionState): void {
    this.state = next;
    logger.debug(`[State] ${next}`);
    this.hooks.onStateChange?.(next);
  }
}

function summarize(
  title: string,
  sanitizedTitle: string,
  outcomes: StrategyOutcomes,
): AcquisitionResult {
  const { download, screenshots, text } = outcomes;
  const result: AcquisitionResult = {
    succeeded: false,
    title,
    sanitizedTitle,
    savedScreenshotPaths:
      screenshots?.status === "produced" ? screenshots.artifact.filePaths : [],
    outcomes,
  };

  if (download?.status === "produced") {
    result.downloadedFilePath = download.artifact.filePath;
  }
  if (text?.status === "produced") {
    result.savedTextPath = text.artifact.filePath;
  }

  result.succeeded =
    result.downloadedFilePath !== undefined ||
    result.savedScreenshotPaths.length > 0 ||
    result.savedTextPath !== undefined;
  return result;
}
