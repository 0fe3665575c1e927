import path from "path";
import puppeteer, {
  TimeoutError,
  type Browser,
  type ElementHandle,
  type Page,
  type Protocol,
} from "puppeteer-core";
import { CHROME_ARGS } from "../types/constants.js";
import { NavigationError, errorMessage } from "../types/errors.js";
import { logger } from "../utils/logger.js";
import type {
  BrowserSession,
  LaunchOptions,
  SessionElement,
} from "./types.js";

function debugLog(...args: unknown[]): void {
  logger.debug(...args);
}

class PuppeteerElement implements SessionElement {
  constructor(private readonly handle: ElementHandle<Element>) {}

  async scrollIntoView(): Promise<void> {
    await this.handle.scrollIntoView();
  }

  async click(): Promise<void> {
    await this.handle.click();
  }

  async screenshot(): Promise<Uint8Array> {
    return await this.handle.screenshot({ type: "png" });
  }
}

/**
 * One browser process with one tab, owned by a single acquisition run.
 */
export class PuppeteerBrowserSession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
  ) {}

  /**
   * Load `url` up to DOMContentLoaded. A slow load is not fatal: whether the
   * viewer shows up is decided by `waitForAny`.
   */
  async navigate(url: string, timeoutMs: number): Promise<void> {
    debugLog(`[Browser] Navigating to ${url}`);
    try {
      await this.page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: timeoutMs,
      });
    } catch (error) {
      if (error instanceof TimeoutError) {
        logger.warn(
          `[Browser] Page still loading after ${timeoutMs}ms, waiting for the viewer anyway`,
        );
        return;
      }
      throw new NavigationError(`Could not load ${url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    debugLog(`[Browser] Final URL: ${this.page.url()}`);
  }

  async waitForAny(
    selectors: readonly string[],
    timeoutMs: number,
  ): Promise<boolean> {
    try {
      await this.page.waitForSelector(selectors.join(", "), {
        timeout: timeoutMs,
      });
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async title(selectors: readonly string[]): Promise<string> {
    const fromSelectors = await this.page.evaluate((candidates: string[]) => {
      for (const selector of candidates) {
        const text = document.querySelector(selector)?.textContent?.trim();
        if (text) {
          return text;
        }
      }
      return "";
    }, [...selectors]);

    return fromSelectors || (await this.page.title());
  }

  async findFirst(selectors: readonly string[]): Promise<SessionElement | null> {
    for (const selector of selectors) {
      try {
        const handle = await this.page.$(selector);
        if (!handle) {
          continue;
        }
        if (await handle.isVisible()) {
          debugLog(`[Browser] Matched "${selector}"`);
          return new PuppeteerElement(handle);
        }
        await handle.dispose();
      } catch (error) {
        debugLog(`[Browser] Selector "${selector}" failed:`, errorMessage(error));
      }
    }
    return null;
  }

  async findAll(selectors: readonly string[]): Promise<SessionElement[]> {
    for (const selector of selectors) {
      try {
        const handles = await this.page.$$(selector);
        if (handles.length > 0) {
          debugLog(`[Browser] ${handles.length} elements match "${selector}"`);
          return handles.map((handle) => new PuppeteerElement(handle));
        }
      } catch (error) {
        debugLog(`[Browser] Selector "${selector}" failed:`, errorMessage(error));
      }
    }
    return [];
  }

  async collectText(
    containerSelectors: readonly string[],
    pageSelectors: readonly string[],
  ): Promise<string[]> {
    return await this.page.evaluate(
      (containers: string[], pages: string[]) => {
        const firstMatch = (selectors: string[]): Element[] => {
          for (const selector of selectors) {
            const matches = Array.from(document.querySelectorAll(selector));
            if (matches.length > 0) {
              return matches;
            }
          }
          return [];
        };

        const container = firstMatch(containers)[0];
        const candidates = container ? [container] : firstMatch(pages);
        // nested page matches would be walked twice
        let roots = candidates.filter(
          (root) => !candidates.some((other) => other !== root && other.contains(root)),
        );
        if (roots.length === 0) {
          roots = [document.body];
        }

        const isHidden = (element: Element): boolean => {
          let current: Element | null = element;
          while (current) {
            if (getComputedStyle(current).display === "none") {
              return true;
            }
            current = current.parentElement;
          }
          return getComputedStyle(element).visibility === "hidden";
        };

        const parts: string[] = [];
        for (const root of roots) {
          const walker = document.createTreeWalker(root, NodeFilter.SHOW_TEXT);
          for (let node = walker.nextNode(); node; node = walker.nextNode()) {
            const text = node.textContent?.trim();
            const parent = node.parentElement;
            if (!text || !parent) {
              continue;
            }
            if (parent.closest("script, style, noscript") || isHidden(parent)) {
              continue;
            }
            parts.push(text);
          }
        }
        return parts;
      },
      [...containerSelectors],
      [...pageSelectors],
    );
  }

  async downloadVia(
    element: SessionElement,
    directory: string,
    timeoutMs: number,
  ): Promise<string | null> {
    const client = await this.page.createCDPSession();
    await client.send("Page.setDownloadBehavior", {
      behavior: "allow",
      downloadPath: path.resolve(directory),
    });

    const names = new Map<string, string>();
    let settle: (filePath: string | null) => void = () => undefined;
    const completed = new Promise<string | null>((resolve) => {
      settle = resolve;
    });

    const onBegin = (event: Protocol.Page.DownloadWillBeginEvent): void => {
      debugLog(`[Download] Started: ${event.suggestedFilename}`);
      names.set(event.guid, event.suggestedFilename);
    };
    const onProgress = (event: Protocol.Page.DownloadProgressEvent): void => {
      if (event.state === "completed") {
        settle(path.join(directory, names.get(event.guid) ?? event.guid));
      } else if (event.state === "canceled") {
        debugLog("[Download] Canceled by the browser");
        settle(null);
      }
    };

    client.on("Page.downloadWillBegin", onBegin);
    client.on("Page.downloadProgress", onProgress);
    const timer = setTimeout(() => settle(null), timeoutMs);

    try {
      await element.click();
      return await completed;
    } finally {
      clearTimeout(timer);
      client.off("Page.downloadWillBegin", onBegin);
      client.off("Page.downloadProgress", onProgress);
      await client.detach().catch((error: unknown) => {
        debugLog("[Download] Could not detach CDP session:", errorMessage(error));
      });
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.browser.close();
    debugLog("[Browser] Browser instance closed");
  }
}

/**
 * Start Chrome and open the tab a run will work in. If anything after the
 * launch fails, the browser process is shut down before the error is
 * rethrown.
 */
export async function launchBrowserSession(
  options: LaunchOptions,
): Promise<PuppeteerBrowserSession> {
  const { width, height } = options.windowSize;
  const browser = await puppeteer.launch({
    executablePath: options.executablePath,
    headless: options.headless,
    defaultViewport: { width, height },
    args: [
      ...CHROME_ARGS,
      `--window-size=${width},${height}`,
      ...(options.args ?? []),
    ],
  });

  try {
    const page = await browser.newPage();
    await page.setUserAgent(options.userAgent);
    return new PuppeteerBrowserSession(browser, page);
  } catch (error) {
    await browser.close().catch((closeError: unknown) => {
      debugLog("[Browser] Error closing browser after failed setup:", closeError);
    });
    throw error;
  }
}
