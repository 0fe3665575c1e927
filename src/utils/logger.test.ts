import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { logger, setLogFile, setVerboseMode } from "./logger.js";

describe("logger file sink", () => {
  let dir: string;
  let logFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "doc-dl-log-"));
    logFile = path.join(dir, "nested", "run.log");
    setLogFile(logFile);
  });

  afterEach(() => {
    setLogFile(null);
    setVerboseMode(false);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates the parent directory and appends timestamped lines", () => {
    logger.info("hello");
    logger.warn("count: %d", 3);

    const lines = fs.readFileSync(logFile, "utf-8").split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - INFO - hello$/);
    expect(lines[1]).toMatch(/ - WARN - count: 3$/);
    expect(lines[2]).toBe("");
  });

  it("writes debug lines to the file even when not verbose", () => {
    setVerboseMode(false);
    logger.debug("quiet detail");

    expect(fs.readFileSync(logFile, "utf-8")).toMatch(/ - DEBUG - quiet detail\n$/);
  });

  it("strips color codes", () => {
    logger.error("\u001b[31mred\u001b[39m");

    expect(fs.readFileSync(logFile, "utf-8")).toMatch(/ - ERROR - red\n$/);
  });

  it("turns the file sink off when the file cannot be written", () => {
    setLogFile(dir);

    expect(() => logger.info("first")).not.toThrow();
    expect(() => logger.error("second")).not.toThrow();

    setLogFile(logFile);
    logger.info("third");
    expect(fs.readFileSync(logFile, "utf-8")).toMatch(/^\S+ - INFO - third\n$/);
  });

  it("skips blank lines", () => {
    logger.info("   ");

    expect(fs.existsSync(logFile)).toBe(false);
  });
});
