#!/usr/bin/env node
/**
 * Document Page Downloader CLI
 *
 * Opens a document page in a headless Chrome, clicks the site's own download
 * button when there is one, then saves a screenshot of every rendered page
 * and the viewer's text into a local folder.
 *
 * @module index
 * @license MIT
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { normalizeDocumentUrl } from "./src/acquisition/helpers.js";
import { AcquisitionOrchestrator } from "./src/acquisition/orchestrator.js";
import { resolveChromeExecutable } from "./src/browser/chrome-path.js";
import { launchBrowserSession } from "./src/browser/browser-session.js";
import { loadConfig, toAcquisitionSettings, type Config } from "./src/config/index.js";
import type { AcquisitionHooks, AcquisitionRequest } from "./src/types/acquisition.js";
import { PromptType } from "./src/types/enums.js";
import { DocDlError, SessionSetupError, errorMessage } from "./src/types/errors.js";
import {
  readPackageVersion,
  showAcquisitionSummary,
  showConfiguration,
  showDisclaimer,
  showHeader,
} from "./src/utils/helpers.js";
import {
  installConsoleBridge,
  logger,
  setLogFile,
  setVerboseMode,
} from "./src/utils/logger.js";
import {
  addPageProgressTask,
  closeProgressBars,
  markPagesDone,
  updatePageProgress,
} from "./src/utils/progress.js";
import { prompt } from "./src/utils/prompt.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

const VERSION = readPackageVersion();

type CliOptions = {
  output?: string;
  headless: boolean;
  chromePath?: string;
  maxPages?: number;
  verbose: boolean;
  logFile?: string;
  interactive: boolean;
};

type RunInputs = {
  url: string;
  outputDirectory: string;
  headless: boolean;
  verbose: boolean;
};

function parseMaxPages(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/** Commander.js program instance */
const program = new Command();

/** Set once a run starts so signal handlers can close its browser. */
let activeOrchestrator: AcquisitionOrchestrator | null = null;

installConsoleBridge();

async function cleanupAfterPromptExit(): Promise<void> {
  closeProgressBars();
  await activeOrchestrator?.shutdown();
}

// ============================================================================
// SECTION 3: TERMINAL USER INTERFACE
// ============================================================================

/**
 * Interactive mode: prompts for the URL, output directory and browser mode.
 * Values given on the command line are offered as defaults.
 */
async function runInteractiveMode(initial: {
  url?: string;
  outputDirectory: string;
  headless: boolean;
  verbose: boolean;
}): Promise<RunInputs> {
  console.log(chalk.cyan("\nInteractive Mode\n"));
  console.log(
    chalk.gray("Press Enter to accept default values shown in brackets.\n"),
  );

  const url = await prompt({
    type: PromptType.Input,
    message: "Document URL:",
    default: initial.url,
    validate: (value) => {
      try {
        normalizeDocumentUrl(value);
        return true;
      } catch (error) {
        return errorMessage(error);
      }
    },
    cleanup: cleanupAfterPromptExit,
  });

  const outputDirectory = await prompt({
    type: PromptType.Input,
    message: "Output directory:",
    default: initial.outputDirectory,
    validate: (value) =>
      value.trim() !== "" || "Output directory is required",
    cleanup: cleanupAfterPromptExit,
  });

  const headless = await prompt({
    type: PromptType.Select,
    message: "Browser mode:",
    choices: [
      { name: "Headless (no window)", value: true },
      { name: "Visible window", value: false },
    ],
    default: initial.headless,
    cleanup: cleanupAfterPromptExit,
  });

  const verbose = await prompt({
    type: PromptType.Confirm,
    message: "Enable verbose output?",
    default: initial.verbose,
    cleanup: cleanupAfterPromptExit,
  });

  return {
    url: normalizeDocumentUrl(url),
    outputDirectory: outputDirectory.trim(),
    headless,
    verbose,
  };
}

/**
 * Progress bar for the screenshot pass. Bars are skipped in verbose mode,
 * where per-page log lines would tear through them.
 */
function createProgressHooks(verbose: boolean): AcquisitionHooks {
  if (verbose) {
    return {};
  }

  let failed = 0;
  return {
    onPagesFound: (total) => {
      failed = 0;
      addPageProgressTask(total);
    },
    onPageCaptured: (pageNumber, total, filePath) => {
      if (filePath === null) {
        failed++;
      }
      updatePageProgress(pageNumber, total, failed);
    },
  };
}

// ============================================================================
// SECTION 4: DOCUMENT ACQUISITION
// ============================================================================

async function acquireDocument(
  request: AcquisitionRequest,
  config: Config,
  chromePath: string,
  maxPages: number | undefined,
  verbose: boolean,
): Promise<boolean> {
  const orchestrator = new AcquisitionOrchestrator({
    openSession: ({ headless }) =>
      launchBrowserSession({
        executablePath: chromePath,
        headless,
        userAgent: config.userAgent,
        windowSize: config.windowSize,
      }),
    settings: toAcquisitionSettings(config, { maxPages }),
    hooks: createProgressHooks(verbose),
  });
  activeOrchestrator = orchestrator;

  try {
    const result = await orchestrator.run(request);
    markPagesDone(result.savedScreenshotPaths.length);
    closeProgressBars();
    showAcquisitionSummary(result);
    return result.succeeded;
  } finally {
    closeProgressBars();
    activeOrchestrator = null;
  }
}

// ============================================================================
// SECTION 5: MAIN APPLICATION
// ============================================================================

/**
 * Main application entry point.
 * @returns the process exit code
 */
async function main(): Promise<number> {
  const config = loadConfig();

  // -------------------------------------------------------------------------
  // CLI Setup
  // -------------------------------------------------------------------------
  program
    .name("doc-dl")
    .description("Save a hosted document by download, page screenshots or text")
    .version(VERSION)
    .argument("[url]", "Document page URL")
    .option("-o, --output <dir>", "Output directory", config.outputDirectory)
    .option("--no-headless", "Run the browser with a visible window")
    .option("--chrome-path <path>", "Chrome/Chromium executable to use")
    .option("--max-pages <number>", "Capture at most this many pages", parseMaxPages)
    .option("-v, --verbose", "Show verbose debug output", false)
    .option("--log-file <path>", "Append log output to a file")
    .option(
      "-i, --interactive",
      "Interactive mode: prompt for URL and options (flags provided will be pre-filled)",
      false,
    )
    .configureHelp({
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Interactive mode: doc-dl
    - Single document: doc-dl https://example.com/document/123/title
    - Custom folder: doc-dl https://example.com/document/123/title -o ./docs
    - Watch the browser: doc-dl https://example.com/document/123/title --no-headless
    - First pages only: doc-dl https://example.com/document/123/title --max-pages 5
    - Files: {output}/{title}.txt and {output}/{title}/page_N.png
      `,
    )
    .parse();

  const options = program.opts<CliOptions>();
  const [urlArgument] = program.args;

  setLogFile(options.logFile ?? null);

  // --no-headless only overrides DOC_DL_HEADLESS when actually passed
  const headless =
    program.getOptionValueSource("headless") === "cli"
      ? options.headless
      : config.headless;

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  let isShuttingDown = false;

  const shutdown = async (label: string, code: number): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(chalk.yellow(`\n\n⚠ ${label}`));
    logger.info(chalk.gray("Cleaning up resources..."));
    closeProgressBars();
    logger.info(chalk.gray("- Closing browser session"));
    await activeOrchestrator?.shutdown();
    logger.info(chalk.gray("Exiting..."));
    process.exit(code);
  };

  process.on("SIGINT", () => {
    void shutdown("Interrupted by user (Ctrl+C)", 130);
  });
  process.on("SIGTERM", () => {
    void shutdown("Received SIGTERM", 143);
  });

  // -------------------------------------------------------------------------
  // Collect Inputs
  // -------------------------------------------------------------------------
  showHeader(VERSION);
  showDisclaimer();

  const outputDirectory = options.output ?? config.outputDirectory;
  let inputs: RunInputs;
  if (options.interactive || !urlArgument) {
    inputs = await runInteractiveMode({
      url: urlArgument,
      outputDirectory,
      headless,
      verbose: options.verbose,
    });
  } else {
    inputs = {
      url: normalizeDocumentUrl(urlArgument),
      outputDirectory,
      headless,
      verbose: options.verbose,
    };
  }

  setVerboseMode(inputs.verbose);

  const chromePath = resolveChromeExecutable({
    explicitPath: options.chromePath ?? config.chromePath,
  });
  const maxPages = options.maxPages ?? config.maxPages;
  const request: AcquisitionRequest = {
    url: inputs.url,
    outputDirectory: inputs.outputDirectory,
    headless: inputs.headless,
  };

  showConfiguration(request, chromePath, maxPages, inputs.verbose);
  console.log(chalk.green("\nStarting download process...\n"));

  // -------------------------------------------------------------------------
  // Execute Acquisition
  // -------------------------------------------------------------------------
  const succeeded = await acquireDocument(
    request,
    config,
    chromePath,
    maxPages,
    inputs.verbose,
  );

  if (succeeded) {
    console.log(chalk.green.bold("\nDownload completed successfully!"));
    return 0;
  }

  console.log(chalk.red("\nDownload failed. Please check the URL and try again."));
  console.log(
    chalk.gray("Note: some documents need an account or subscription to view."),
  );
  return 1;
}

// ============================================================================
// SECTION 6: ERROR HANDLING
// ============================================================================

main()
  .then((code) => {
    process.exit(code);
  })
  .catch(async (err: unknown) => {
    closeProgressBars();
    await activeOrchestrator?.shutdown();
    if (err instanceof SessionSetupError) {
      console.error(chalk.red(`\n✖ ${err.message}`));
      console.error(
        chalk.gray("A Chrome or Chromium browser must be installed to run doc-dl."),
      );
    } else if (err instanceof DocDlError) {
      console.error(chalk.red(`\n✖ ${err.message}`));
    } else {
      console.error(chalk.red(err));
    }
    process.exit(1);
  });
