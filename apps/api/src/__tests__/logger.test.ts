import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { closeLogger, formatLogLine, getLogFilePath, initLogger } from "../services/logger.js";

describe("formatLogLine", () => {
  it("stamps the time and pads the level", () => {
    const now = new Date(Date.UTC(2024, 2, 1, 8, 15, 0, 123));
    expect(formatLogLine("WARN", ["[Pool] training:", { skipped: 1 }], now)).toBe(
      '[08:15:00.123] [WARN ] [Pool] training: {"skipped":1}\n'
    );
  });
});

describe("initLogger", () => {
  let dir: string | undefined;

  afterEach(async () => {
    closeLogger();
    vi.restoreAllMocks();
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("mirrors console output into the day's file until closed", async () => {
    dir = await mkdtemp(join(tmpdir(), "gantry-logs-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    const path = initLogger({ dir });
    expect(path).toMatch(/synth-\d{4}-\d{2}-\d{2}\.log$/);
    expect(getLogFilePath()).toBe(path);

    console.log("[Test] mirrored");
    closeLogger();
    console.log("[Test] not mirrored");

    const content = await readFile(path, "utf-8");
    expect(content).toContain("Synthesis session started");
    expect(content).toMatch(/\] \[INFO \] \[Test\] mirrored\n/);
    expect(content).not.toContain("not mirrored");
    expect(getLogFilePath()).toBeNull();
  });
});
