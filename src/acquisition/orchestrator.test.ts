import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SessionFactory } from "../browser/types.js";
import {
  FakeBrowserSession,
  FakeElement,
  PNG_BYTES,
  type FakeSessionOptions,
  type FaultySessionMethod,
} from "../test/fake-browser-session.js";
import type { AcquisitionHooks, AcquisitionSettings } from "../types/acquisition.js";
import { AcquisitionState } from "../types/enums.js";
import { NoContentFoundError, SessionSetupError } from "../types/errors.js";
import { AcquisitionOrchestrator } from "./orchestrator.js";

const settings: AcquisitionSettings = {
  navigationTimeoutMs: 1000,
  viewerTimeoutMs: 1000,
  downloadSettleMs: 0,
  pageSettleMs: 0,
  maxTitleLength: 150,
  viewerSelectors: [".viewer"],
  textContainerSelectors: [".viewer"],
  downloadSelectors: [".download"],
  pageSelectors: [".page"],
  titleSelectors: ["h1"],
};

describe("AcquisitionOrchestrator", () => {
  let tmpDir: string;
  let outputDirectory: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "doc-dl-"));
    outputDirectory = path.join(tmpDir, "out");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function setup(
    sessionOptions: FakeSessionOptions,
    overrides: Partial<AcquisitionSettings> = {},
    hooks?: AcquisitionHooks,
  ) {
    const session = new FakeBrowserSession(sessionOptions);
    const openSession = vi.fn<SessionFactory>(async () => session);
    const orchestrator = new AcquisitionOrchestrator({
      openSession,
      settings: { ...settings, ...overrides },
      hooks,
    });
    const run = () =>
      orchestrator.run({
        url: "https://docs.example.test/document/42/sample",
        outputDirectory,
        headless: true,
      });
    return { session, openSession, orchestrator, run };
  }

  const pages = (count: number) =>
    Array.from({ length: count }, () => new FakeElement());

  it("saves three pages and the text for a fully rendered document", async () => {
    const { session, run } = setup({
      title: "Sample Document",
      pages: pages(3),
      text: ["First page text", "Second page text"],
    });

    const result = await run();

    const docDir = path.join(outputDirectory, "Sample Document");
    expect(result.succeeded).toBe(true);
    expect(result.sanitizedTitle).toBe("Sample Document");
    expect(result.savedScreenshotPaths).toEqual([
      path.join(docDir, "page_1.png"),
      path.join(docDir, "page_2.png"),
      path.join(docDir, "page_3.png"),
    ]);
    expect(fs.readdirSync(docDir).sort()).toEqual([
      "page_1.png",
      "page_2.png",
      "page_3.png",
    ]);
    expect(new Uint8Array(fs.readFileSync(path.join(docDir, "page_2.png")))).toEqual(
      PNG_BYTES,
    );

    const textFile = path.join(outputDirectory, "Sample Document.txt");
    expect(result.savedTextPath).toBe(textFile);
    expect(fs.readFileSync(textFile, "utf-8")).toBe(
      "First page text\nSecond page text\n",
    );
    expect(session.closeCalls).toBe(1);
  });

  it("passes the headless flag to the session factory", async () => {
    const { openSession, run } = setup({ pages: pages(1) });

    await run();

    expect(openSession).toHaveBeenCalledTimes(1);
    expect(openSession).toHaveBeenCalledWith({ headless: true });
  });

  it("skips the download step when there is no download control and still captures pages", async () => {
    const { session, run } = setup({ downloadControl: null, pages: pages(2) });

    const result = await run();

    expect(result.outcomes.download).toEqual({
      status: "skipped",
      reason: "no download control on the page",
    });
    expect(result.outcomes.screenshots?.status).toBe("produced");
    expect(result.savedScreenshotPaths).toHaveLength(2);
    expect(session.calls).not.toContain("downloadVia");
    expect(result.downloadedFilePath).toBeUndefined();
  });

  it("records a download when clicking the control saves a file", async () => {
    const control = new FakeElement();
    const { run } = setup({
      downloadControl: control,
      downloadFileName: "sample.pdf",
    });

    const result = await run();

    const expected = path.join(outputDirectory, "sample.pdf");
    expect(control.clicks).toBe(1);
    expect(result.downloadedFilePath).toBe(expected);
    expect(fs.existsSync(expected)).toBe(true);
    expect(result.succeeded).toBe(true);
  });

  it("skips the download when the click does not produce a file", async () => {
    const control = new FakeElement();
    const { run } = setup({
      downloadControl: control,
      downloadFileName: null,
      pages: pages(1),
    });

    const result = await run();

    expect(control.clicks).toBe(1);
    expect(result.outcomes.download).toEqual({
      status: "skipped",
      reason: "click did not trigger a download",
    });
    expect(result.succeeded).toBe(true);
  });

  it("fails without writing anything when the viewer never appears", async () => {
    const { session, run } = setup({
      viewerReady: false,
      pages: pages(3),
      text: ["never read"],
    });

    const result = await run();

    expect(result.succeeded).toBe(false);
    expect(result.failure).toBe("Document viewer did not appear within 1000ms");
    expect(result.savedScreenshotPaths).toEqual([]);
    expect(result.savedTextPath).toBeUndefined();
    expect(result.outcomes).toEqual({});
    expect(fs.existsSync(outputDirectory)).toBe(false);
    expect(session.calls).toEqual(["navigate", "waitForAny", "close"]);
    expect(session.closeCalls).toBe(1);
  });

  it("fails without running any strategy when navigation throws", async () => {
    const { session, run } = setup({
      failOn: "navigate",
      failWith: new Error("net::ERR_NAME_NOT_RESOLVED"),
    });

    const result = await run();

    expect(result.succeeded).toBe(false);
    expect(result.failure).toBe("net::ERR_NAME_NOT_RESOLVED");
    expect(session.calls).toEqual(["navigate", "close"]);
  });

  it("keeps DOM numbering when a page fails to capture", async () => {
    const hooks = { onPageCaptured: vi.fn() };
    const { run } = setup(
      {
        pages: [
          new FakeElement(),
          new FakeElement({ failScreenshot: true }),
          new FakeElement(),
        ],
      },
      {},
      hooks,
    );

    const result = await run();

    const docDir = path.join(outputDirectory, "Sample Document");
    expect(result.savedScreenshotPaths).toEqual([
      path.join(docDir, "page_1.png"),
      path.join(docDir, "page_3.png"),
    ]);
    expect(fs.readdirSync(docDir).sort()).toEqual(["page_1.png", "page_3.png"]);
    expect(result.outcomes.screenshots).toEqual({
      status: "produced",
      artifact: {
        directory: docDir,
        filePaths: [path.join(docDir, "page_1.png"), path.join(docDir, "page_3.png")],
        failedPages: [2],
      },
    });
    expect(hooks.onPageCaptured.mock.calls).toEqual([
      [1, 3, path.join(docDir, "page_1.png")],
      [2, 3, null],
      [3, 3, path.join(docDir, "page_3.png")],
    ]);
  });

  it("reports missing pages and still extracts text", async () => {
    const { run } = setup({ pages: [], text: ["Only text here"] });

    const result = await run();

    const screenshots = result.outcomes.screenshots;
    expect(screenshots?.status).toBe("skipped");
    if (screenshots?.status === "skipped") {
      expect(screenshots.error).toBeInstanceOf(NoContentFoundError);
      expect(screenshots.reason).toBe("No document pages found for screenshot");
    }
    expect(fs.existsSync(path.join(outputDirectory, "Sample Document"))).toBe(false);
    expect(result.savedTextPath).toBe(path.join(outputDirectory, "Sample Document.txt"));
    expect(result.succeeded).toBe(true);
  });

  it("reports failure when every strategy comes up empty", async () => {
    const { session, run } = setup({ pages: [], text: ["   ", ""] });

    const result = await run();

    expect(result.succeeded).toBe(false);
    expect(result.failure).toBeUndefined();
    expect(result.outcomes.text).toEqual({
      status: "skipped",
      reason: "viewer contains no text",
    });
    expect(fs.existsSync(path.join(outputDirectory, "Sample Document.txt"))).toBe(false);
    expect(session.closeCalls).toBe(1);
  });

  it("caps the number of captured pages", async () => {
    const onPagesFound = vi.fn();
    const { run } = setup({ pages: pages(5) }, { maxPages: 2 }, { onPagesFound });

    const result = await run();

    expect(onPagesFound).toHaveBeenCalledWith(2);
    expect(result.savedScreenshotPaths.map((p) => path.basename(p))).toEqual([
      "page_1.png",
      "page_2.png",
    ]);
  });

  it("names output after the sanitized page title", async () => {
    const { run } = setup({ title: "Annual Report: 2024/Q1", text: ["body"] });

    const result = await run();

    expect(result.title).toBe("Annual Report: 2024/Q1");
    expect(result.sanitizedTitle).toBe("Annual Report_ 2024_Q1");
    expect(result.savedTextPath).toBe(
      path.join(outputDirectory, "Annual Report_ 2024_Q1.txt"),
    );
  });

  it("walks the states in order", async () => {
    const onStateChange = vi.fn();
    const { orchestrator, run } = setup({ pages: pages(1) }, {}, { onStateChange });

    await run();

    expect(onStateChange.mock.calls.map(([state]) => state)).toEqual([
      AcquisitionState.Init,
      AcquisitionState.NavigatingToDocument,
      AcquisitionState.StrategyA,
      AcquisitionState.StrategyB,
      AcquisitionState.StrategyC,
      AcquisitionState.TearDown,
      AcquisitionState.Done,
    ]);
    expect(orchestrator.currentState).toBe(AcquisitionState.Done);
  });

  it("goes straight to teardown when navigation fails", async () => {
    const onStateChange = vi.fn();
    const { run } = setup({ viewerReady: false }, {}, { onStateChange });

    await run();

    expect(onStateChange.mock.calls.map(([state]) => state)).toEqual([
      AcquisitionState.Init,
      AcquisitionState.NavigatingToDocument,
      AcquisitionState.TearDown,
      AcquisitionState.Done,
    ]);
  });

  describe("session cleanup", () => {
    const faults: FaultySessionMethod[] = [
      "navigate",
      "waitForAny",
      "title",
      "findFirst",
      "downloadVia",
      "findAll",
      "collectText",
      "close",
    ];

    it.each(faults)("closes the session exactly once when %s throws", async (method) => {
      const { session, run } = setup({
        failOn: method,
        downloadControl: new FakeElement(),
        downloadFileName: "sample.pdf",
        pages: pages(2),
        text: ["text"],
      });

      await expect(run()).resolves.toMatchObject({
        savedScreenshotPaths: expect.any(Array),
      });
      expect(session.closeCalls).toBe(1);
    });

    it("keeps later strategies running after one throws", async () => {
      const { session, run } = setup({
        failOn: "findAll",
        pages: pages(2),
        text: ["still saved"],
      });

      const result = await run();

      expect(result.outcomes.screenshots).toMatchObject({
        status: "skipped",
        reason: "failed: findAll failed",
      });
      expect(result.savedTextPath).toBe(path.join(outputDirectory, "Sample Document.txt"));
      expect(session.calls).toContain("collectText");
    });

    it("uses an untitled name when the title cannot be read", async () => {
      const { run } = setup({ failOn: "title", text: ["body"] });

      const result = await run();

      expect(result.sanitizedTitle).toBe("untitled_document");
      expect(result.savedTextPath).toBe(path.join(outputDirectory, "untitled_document.txt"));
    });

    it("does not close twice when shut down mid-run", async () => {
      let orchestratorRef: AcquisitionOrchestrator | null = null;
      const { session, orchestrator, run } = setup(
        { pages: pages(2) },
        {},
        {
          onPagesFound: () => {
            void orchestratorRef?.shutdown();
          },
        },
      );
      orchestratorRef = orchestrator;

      await run();

      expect(session.closeCalls).toBe(1);
    });
  });

  describe("session setup", () => {
    it("wraps a failing browser launch in SessionSetupError", async () => {
      const orchestrator = new AcquisitionOrchestrator({
        openSession: async () => {
          throw new Error("spawn chrome ENOENT");
        },
        settings,
      });

      const run = orchestrator.run({
        url: "https://docs.example.test/document/1/x",
        outputDirectory,
        headless: true,
      });

      await expect(run).rejects.toBeInstanceOf(SessionSetupError);
      await expect(run).rejects.toThrow("Could not start the browser: spawn chrome ENOENT");
      expect(orchestrator.currentState).toBe(AcquisitionState.Done);
      expect(fs.existsSync(outputDirectory)).toBe(false);
    });

    it("rethrows a SessionSetupError unchanged", async () => {
      const error = new SessionSetupError("Browser executable not found at /nope");
      const orchestrator = new AcquisitionOrchestrator({
        openSession: async () => {
          throw error;
        },
        settings,
      });

      await expect(
        orchestrator.run({ url: "https://docs.example.test/", outputDirectory, headless: false }),
      ).rejects.toBe(error);
    });
  });
});
