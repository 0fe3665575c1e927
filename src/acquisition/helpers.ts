import fs from "fs";
import path from "path";
import { DEFAULT_MAX_TITLE_LENGTH, UNTITLED_DOCUMENT } from "../types/constants.js";
import { InvalidUrlError } from "../types/errors.js";

const trimSeparators = (value: string): string =>
  value.replace(/^[ _]+|[ _]+$/g, "");

/**
 * Turn a document title into a directory/file name.
 *
 * Anything outside `[A-Za-z0-9 _-]` becomes `_`, runs of the same separator
 * collapse to one, and the result is cut to `maxLength`. The output is also
 * the key that groups a document's screenshots, so the function is pure and
 * `sanitizeTitle(sanitizeTitle(x)) === sanitizeTitle(x)`.
 */
export function sanitizeTitle(
  title: string,
  maxLength: number = DEFAULT_MAX_TITLE_LENGTH,
): string {
  if (!Number.isInteger(maxLength) || maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${maxLength}`);
  }

  const replaced = title
    .replace(/[^A-Za-z0-9 _-]/g, "_")
    .replace(/_+/g, "_")
    .replace(/ +/g, " ")
    .replace(/-+/g, "-");

  const truncated = trimSeparators(trimSeparators(replaced).slice(0, maxLength));
  return truncated || trimSeparators(UNTITLED_DOCUMENT.slice(0, maxLength));
}

/**
 * Normalize text pulled out of the viewer: unix line endings, no control
 * characters, no trailing spaces, at most one blank line in a row.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "")
    .replace(/[ \t]+$/gm, "")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

export function normalizeDocumentUrl(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidUrlError("Document URL is required");
  }

  const withScheme = /^[a-z][a-z0-9+.-]*:/i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (error) {
    throw new InvalidUrlError(`Not a valid URL: ${input}`, { cause: error });
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidUrlError(
      `Only http and https URLs are supported, got ${url.protocol}`,
    );
  }
  if (!url.hostname) {
    throw new InvalidUrlError(`URL has no host: ${input}`);
  }

  url.hash = "";
  return url.toString();
}

export function extractDocumentId(url: string): string | null {
  const match = url.match(/\/document\/(\d+)(?:\/|$)/);
  return match?.[1] ?? null;
}

export function writeArtifact(filePath: string, data: string | Uint8Array): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, data);
  return filePath;
}
