/**
 * Unit tests for the last-run timestamp file.
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readLastRun, saveLastRun } from "../../src/server/digest/run-state";

const NOW = new Date("2026-10-19T10:00:00Z");

describe("run state", () => {
  let dir: string;
  let statePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "digest-run-state-"));
    statePath = path.join(dir, ".last_run");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("defaults to three days back when nothing is stored", async () => {
    expect(await readLastRun(statePath, NOW)).toEqual(new Date("2026-10-16T10:00:00Z"));
  });

  it("honors a custom lookback", async () => {
    expect(await readLastRun(statePath, NOW, 7)).toEqual(new Date("2026-10-12T10:00:00Z"));
  });

  it("reads back a saved timestamp", async () => {
    const lastRun = new Date("2026-10-18T11:30:15.250Z");
    await saveLastRun(statePath, lastRun);

    expect(await fs.readFile(statePath, "utf8")).toBe("2026-10-18T11:30:15.250Z");
    expect(await readLastRun(statePath, NOW)).toEqual(lastRun);
  });

  it("accepts surrounding whitespace", async () => {
    await fs.writeFile(statePath, "2026-10-18T06:00:00Z\n");
    expect(await readLastRun(statePath, NOW)).toEqual(new Date("2026-10-18T06:00:00Z"));
  });

  it("falls back when the file is unreadable", async () => {
    await fs.writeFile(statePath, "not a date");
    expect(await readLastRun(statePath, NOW)).toEqual(new Date("2026-10-16T10:00:00Z"));
  });
});
