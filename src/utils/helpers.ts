import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { extractDocumentId } from "../acquisition/helpers.js";
import type {
  AcquisitionRequest,
  AcquisitionResult,
  StrategyOutcome,
} from "../types/acquisition.js";
import { getAsciiArt } from "./ascii.js";

/**
 * Version from the nearest package.json, looking beside this module's
 * source tree and beside the compiled `dist/` tree.
 */
export function readPackageVersion(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [
    path.join(here, "..", "..", "package.json"),
    path.join(here, "..", "..", "..", "package.json"),
  ];

  for (const candidate of candidates) {
    if (!fs.existsSync(candidate)) {
      continue;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "version" in parsed &&
      typeof parsed.version === "string"
    ) {
      return parsed.version;
    }
  }
  return "0.0.0";
}

export function showHeader(version: string): void {
  console.log(chalk.cyan.bold("\n"));
  console.log(chalk.cyan(getAsciiArt("DOC-DL")));
  console.log(chalk.cyan.bold(`\nDocument page downloader (Version ${version})`));
}

export function showDisclaimer(): void {
  console.log(
    chalk.yellow(
      "\n╔════════════════════════════════════════════════════════════╗",
    ),
  );
  console.log(
    chalk.yellow(
      "║  NOTICE: This tool is for PERSONAL USE only                ║",
    ),
  );
  console.log(
    chalk.yellow(
      "╠════════════════════════════════════════════════════════════╣",
    ),
  );
  console.log(
    chalk.yellow(
      "║  • Only save documents you are allowed to keep             ║",
    ),
  );
  console.log(
    chalk.yellow(
      "║  • Respect the hosting site's terms and copyright          ║",
    ),
  );
  console.log(
    chalk.yellow(
      "╚════════════════════════════════════════════════════════════╝\n",
    ),
  );
}

export function showConfiguration(
  request: AcquisitionRequest,
  chromePath: string,
  maxPages: number | undefined,
  isVerbose: boolean,
): void {
  const documentId = extractDocumentId(request.url);

  console.log(chalk.cyan("\nCollected inputs:"));
  console.log(chalk.white(`  URL: ${request.url}`));
  if (documentId) {
    console.log(chalk.white(`  Document ID: ${documentId}`));
  }
  console.log(chalk.white(`  Output directory: ${request.outputDirectory}`));
  console.log(
    chalk.white(`  Browser: ${request.headless ? "Headless" : "Visible window"}`),
  );
  console.log(chalk.white(`  Browser executable: ${chromePath}`));
  console.log(
    chalk.white(`  Page limit: ${maxPages === undefined ? "None" : maxPages}`),
  );
  console.log(chalk.white(`  Verbose: ${isVerbose ? "Yes" : "No"}`));
}

function describeOutcome<T>(
  outcome: StrategyOutcome<T> | undefined,
  describe: (artifact: T) => string,
): string {
  if (!outcome) {
    return chalk.gray("not attempted");
  }
  if (outcome.status === "produced") {
    return chalk.green(describe(outcome.artifact));
  }
  return chalk.yellow(`skipped (${outcome.reason})`);
}

export function showAcquisitionSummary(result: AcquisitionResult): void {
  const { download, screenshots, text } = result.outcomes;

  console.log(chalk.cyan(`\n========================================`));
  console.log(chalk.cyan(`Acquisition Summary:`));
  if (result.title !== null) {
    console.log(chalk.white(`  Title: ${result.title || "(untitled)"}`));
  }
  if (result.failure) {
    console.log(chalk.red(`  Page not loaded: ${result.failure}`));
  } else {
    console.log(
      `  Download: ${describeOutcome(download, (a) => a.filePath)}`,
    );
    console.log(
      `  Screenshots: ${describeOutcome(screenshots, (a) =>
        a.failedPages.length > 0
          ? `${a.filePaths.length} saved, pages ${a.failedPages.join(", ")} failed`
          : `${a.filePaths.length} saved in ${a.directory}`,
      )}`,
    );
    console.log(
      `  Text: ${describeOutcome(text, (a) => `${a.characters} characters in ${a.filePath}`)}`,
    );
  }
  console.log(chalk.cyan(`========================================`));
}
