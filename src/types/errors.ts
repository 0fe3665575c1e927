/**
 * Error types raised while acquiring a document.
 *
 * Only {@link SessionSetupError} ever leaves the orchestrator; the others are
 * caught there and turned into skipped strategy outcomes or a failed result.
 */
export class DocDlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Browser or driver could not be started. Fatal for the run. */
export class SessionSetupError extends DocDlError {}

/** The document page could not be loaded. Ends the run without artifacts. */
export class NavigationError extends DocDlError {}

/** The page loaded but the document viewer never appeared. */
export class NavigationTimeoutError extends NavigationError {}

/** No page elements were found for the screenshot strategy. */
export class NoContentFoundError extends DocDlError {}

export class InvalidUrlError extends DocDlError {}

export class ConfigError extends DocDlError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
