/**
 * What the orchestrator needs from a browser. The puppeteer-core session in
 * `browser-session.ts` is the real implementation; tests use fakes.
 */
export interface SessionElement {
  scrollIntoView(): Promise<void>;
  click(): Promise<void>;
  /** PNG bytes of the element's bounding box. */
  screenshot(): Promise<Uint8Array>;
}

export interface BrowserSession {
  /** @throws NavigationError when the page cannot be loaded in time. */
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** Resolves false when none of the selectors shows up within the timeout. */
  waitForAny(selectors: readonly string[], timeoutMs: number): Promise<boolean>;
  /** Text of the first non-empty title selector, else `document.title`. */
  title(selectors: readonly string[]): Promise<string>;
  /** First visible element matching any selector, tried in order. */
  findFirst(selectors: readonly string[]): Promise<SessionElement | null>;
  /** Every element of the first selector that matches anything, in DOM order. */
  findAll(selectors: readonly string[]): Promise<SessionElement[]>;
  /**
   * Visible text nodes in DOM order. The root is the first matching
   * container; without one, every element of the first matching page
   * selector; without those, `<body>`.
   */
  collectText(
    containerSelectors: readonly string[],
    pageSelectors: readonly string[],
  ): Promise<string[]>;
  /**
   * Click `element` and wait for the browser to report a finished download
   * into `directory`. Resolves with the saved path, or null if nothing
   * completed in time.
   */
  downloadVia(
    element: SessionElement,
    directory: string,
    timeoutMs: number,
  ): Promise<string | null>;
  close(): Promise<void>;
}

export interface SessionOptions {
  headless: boolean;
}

export type SessionFactory = (options: SessionOptions) => Promise<BrowserSession>;

export interface LaunchOptions extends SessionOptions {
  executablePath: string;
  userAgent: string;
  windowSize: { width: number; height: number };
  args?: readonly string[];
}
