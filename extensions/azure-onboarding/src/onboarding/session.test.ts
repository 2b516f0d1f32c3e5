import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { transcriptFileName, withRunSession } from "./session.js";
import { MemoryTransport } from "../logging/logger.js";

const AT = new Date("2026-03-01T09:30:15.250Z");

describe("transcriptFileName", () => {
  it("makes the timestamp safe for file names", () => {
    expect(transcriptFileName("ClientA-Developer", AT)).toBe("ClientA-Developer-2026-03-01T09-30-15-250Z.log");
  });
});

describe("withRunSession", () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = await mkdtemp(path.join(tmpdir(), "onboarding-logs-"));
  });

  afterEach(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  it("writes the transcript and returns the callback result", async () => {
    const result = await withRunSession(
      { label: "ClientA-Developer", logDir, console: false, now: () => AT },
      async ({ logger, transcriptPath }) => {
        logger.info("hello");
        return transcriptPath;
      },
    );

    expect(result).toBe(path.join(logDir, "ClientA-Developer-2026-03-01T09-30-15-250Z.log"));
    const text = await readFile(path.join(logDir, "ClientA-Developer-2026-03-01T09-30-15-250Z.log"), "utf8");
    expect(text).toContain("INFO  [onboarding] hello");
  });

  it("logs the abort, closes the transcript and rethrows", async () => {
    const memory = new MemoryTransport();
    const run = withRunSession(
      { label: "ClientA-Developer", logDir, console: false, transports: [memory], now: () => AT },
      async ({ logger }) => {
        logger.info("starting");
        throw new Error("Permission manifest not found: x.csv");
      },
    );

    await expect(run).rejects.toThrow("Permission manifest not found: x.csv");
    expect(memory.messages("error")).toEqual(["Run aborted: Permission manifest not found: x.csv"]);
    const text = await readFile(path.join(logDir, "ClientA-Developer-2026-03-01T09-30-15-250Z.log"), "utf8");
    expect(text.trim().split("\n")).toHaveLength(2);
  });

  it("rejects when the transcript cannot be opened", async () => {
    await mkdir(path.join(logDir, "ClientA-Developer-2026-03-01T09-30-15-250Z.log"));
    const memory = new MemoryTransport();

    const run = withRunSession(
      { label: "ClientA-Developer", logDir, console: false, transports: [memory], now: () => AT },
      async ({ logger }) => {
        logger.info("start");
        await new Promise((resolve) => setTimeout(resolve, 50));
        return "done";
      },
    );

    await expect(run).rejects.toMatchObject({ code: "EISDIR" });
    expect(memory.messages()).toEqual(["start"]);
  });

  it("creates no file when the transcript is disabled", async () => {
    const memory = new MemoryTransport();
    const transcriptPath = await withRunSession(
      { label: "x", logDir, console: false, transcript: false, transports: [memory] },
      async (session) => {
        session.logger.info("only in memory");
        return session.transcriptPath;
      },
    );

    expect(transcriptPath).toBeUndefined();
    expect(memory.messages()).toEqual(["only in memory"]);
    expect(await readdir(logDir)).toEqual([]);
  });
});
