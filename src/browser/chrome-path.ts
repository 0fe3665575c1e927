import fs from "fs";
import path from "path";
import { CHROME_BINARY_NAMES, CHROME_INSTALL_PATHS } from "../types/constants.js";
import { SessionSetupError } from "../types/errors.js";

export type ChromeLookupOptions = {
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  exists?: (candidate: string) => boolean;
};

function isExecutableFile(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

/**
 * Every place we look for a browser, in priority order.
 */
export function chromeCandidates(env: NodeJS.ProcessEnv): string[] {
  const fromPath = (env.PATH ?? "")
    .split(path.delimiter)
    .filter((dir) => dir.length > 0)
    .flatMap((dir) => CHROME_BINARY_NAMES.map((name) => path.join(dir, name)));

  return [
    env.DOC_DL_CHROME_PATH,
    env.CHROME_PATH,
    ...fromPath,
    ...CHROME_INSTALL_PATHS,
  ].filter((item): item is string => Boolean(item));
}

/**
 * Locate a Chrome/Chromium executable. An explicit path wins and must exist;
 * otherwise environment variables, then PATH, then the usual install
 * locations are tried.
 *
 * @throws SessionSetupError if nothing usable is found
 */
export function resolveChromeExecutable(options: ChromeLookupOptions = {}): string {
  const env = options.env ?? process.env;
  const exists = options.exists ?? isExecutableFile;

  if (options.explicitPath) {
    if (exists(options.explicitPath)) {
      return options.explicitPath;
    }
    throw new SessionSetupError(
      `Browser executable not found at ${options.explicitPath}`,
    );
  }

  const found = chromeCandidates(env).find((candidate) => exists(candidate));
  if (found) {
    return found;
  }

  throw new SessionSetupError(
    "Chrome or Chromium not found. Install it, put it on PATH, " +
      "or set DOC_DL_CHROME_PATH / pass --chrome-path.",
  );
}
