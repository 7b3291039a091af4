import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { appendToLogFile, createLogger, getLogFile, setConsoleLevel, setLogFile } from "./logger";

describe("Logger", () => {
  let dir: string;
  let logFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "forkflow-logger-"));
    logFile = join(dir, "nested", "sync.log");
  });

  afterEach(() => {
    setLogFile(null);
    setConsoleLevel(null);
    rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it("should be silent under NODE_ENV=test when no level is given", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);

    createLogger("[Test] ").info("hello");

    expect(log).not.toHaveBeenCalled();
  });

  it("should prefix console output and respect the level", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createLogger("[Test] ", "warn");

    logger.info("skipped");
    logger.warn("careful");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[Test] careful");
  });

  it("should let the console level override apply to existing loggers", () => {
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = createLogger("[Test] ", "info");

    setConsoleLevel("error");
    logger.info("hidden");
    logger.error("shown");
    setConsoleLevel(null);
    logger.info("visible again");

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith("[Test] visible again");
    expect(error).toHaveBeenCalledWith("[Test] shown");
  });

  it("should append info, warn and error lines to the log file whatever the console level", () => {
    setLogFile(logFile);
    const logger = createLogger("[Test] ", "silent");

    logger.debug("not recorded");
    logger.info("fetched");
    logger.error("failed");

    const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] \[Test\] fetched$/);
    expect(lines[1]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[ERROR\] \[Test\] failed$/);
  });

  it("should append raw command output with a trailing newline", () => {
    setLogFile(logFile);

    appendToLogFile("PASS src/app.test.ts");
    appendToLogFile("");
    appendToLogFile("done\n");

    expect(getLogFile()).toBe(logFile);
    expect(readFileSync(logFile, "utf8")).toBe("PASS src/app.test.ts\ndone\n");
  });

  it("should write nothing without a log file", () => {
    expect(() => appendToLogFile("ignored")).not.toThrow();
    expect(getLogFile()).toBeNull();
  });
});
