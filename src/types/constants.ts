export const DEFAULT_OUTPUT_DIR = "downloads";

export const DEFAULT_NAVIGATION_TIMEOUT_MS = 30000;
export const DEFAULT_VIEWER_TIMEOUT_MS = 15000;
export const DEFAULT_DOWNLOAD_SETTLE_MS = 5000;
export const DEFAULT_PAGE_SETTLE_MS = 1000;
export const DEFAULT_MAX_TITLE_LENGTH = 150;

export const UNTITLED_DOCUMENT = "untitled_document";

export const DEFAULT_WINDOW_SIZE = { width: 1920, height: 1080 };

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) " +
  "AppleWebKit/537.36 (KHTML, like Gecko) " +
  "Chrome/120.0.0.0 Safari/537.36";

export const CHROME_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--no-first-run",
  "--no-default-browser-check",
];

// `::-p-text(...)` is puppeteer's text selector; plain CSS cannot match on text.
export const DOWNLOAD_SELECTORS = [
  'button[data-testid="download-button"]',
  ".download_button",
  ".btn-download",
  "#download-btn",
  '[aria-label*="download" i]',
  "button::-p-text(Download)",
  "a::-p-text(Download)",
];

export const VIEWER_SELECTORS = [
  ".document_viewer",
  ".document-viewer",
  "#document_container",
  ".outer_page_container",
  ".document_content",
  ".document_page",
  ".page",
  "[data-page]",
];

/**
 * Containers that hold every page of the viewer. Text extraction walks the
 * first one found, or every page element when none matches.
 */
export const TEXT_CONTAINER_SELECTORS = [
  ".document_viewer",
  ".document-viewer",
  "#document_container",
  ".outer_page_container",
  ".document_content",
];

export const PAGE_SELECTORS = [
  ".page",
  ".document_page",
  "[data-page]",
  ".text_layer",
  ".page-container",
  ".document-page",
];

export const TITLE_SELECTORS = [
  "h1.document_title",
  ".document-title",
  ".doc-title",
  "h1",
];

export const CHROME_BINARY_NAMES = [
  "google-chrome",
  "google-chrome-stable",
  "chromium",
  "chromium-browser",
  "chrome",
];

export const CHROME_INSTALL_PATHS = [
  "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
  "/Applications/Chromium.app/Contents/MacOS/Chromium",
  "C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe",
  "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
];
