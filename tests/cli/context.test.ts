import { readFile } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { loadCliContext } from "../../src/cli/context";
import { info, setConsoleQuiet, setLogFile, setLogLevel } from "../../src/utils/logger";
import { makeInstall, makeTempDir, removeTempDir } from "../helpers";

describe("loadCliContext", () => {
  let root: string;
  let installDir: string;
  let consoleLogSpy: MockInstance;

  beforeEach(async () => {
    setLogLevel("info");
    root = await makeTempDir("cli-context");
    installDir = await makeInstall(root, "sqlite");
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    setLogLevel("info");
    setConsoleQuiet(false);
    setLogFile(null);
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  test("quiet console sends log lines to the log file only", async () => {
    const ctx = await loadCliContext({ "install-dir": installDir }, { quietConsole: true });

    info("Creating backup");

    expect(consoleLogSpy).not.toHaveBeenCalled();
    expect(await readFile(ctx.paths.logFile, "utf8")).toMatch(/\] INFO  Creating backup\n$/);
  });

  test("--verbose keeps log lines on the console", async () => {
    await loadCliContext({ "install-dir": installDir, verbose: true }, { quietConsole: true });
    consoleLogSpy.mockClear();

    info("Creating backup");

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
  });

  test("commands without a spinner log to the console", async () => {
    await loadCliContext({ "install-dir": installDir });

    info("Scheduler started");

    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
  });
});
