import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  formatProgressReport,
  OmrStatusTracker,
  readOmrProgressSnapshot,
  summarizeOmrProgress,
} from "../../src/ts/progress";

describe("summarizeOmrProgress", () => {
  it("classifies pages and estimates the remaining time", () => {
    const summary = summarizeOmrProgress({
      pages: ["page-01", "page-02", "page-03", "page-04"],
      completedOutputs: new Map([["page-01", 2048]]),
      activeJobs: new Set(["page-02", "page-03"]),
      logTails: new Map([["page-02", "Predicting stems"]]),
    });
    expect(summary).toEqual({
      total: 4,
      completed: 1,
      running: 2,
      percent: 25,
      done: false,
      estimatedMinutesRemaining: 36,
      pages: [
        { page: "page-01", status: "complete", detail: "2.0 KB" },
        { page: "page-02", status: "processing", detail: "Predicting stems" },
        { page: "page-03", status: "starting", detail: "" },
        { page: "page-04", status: "waiting", detail: "" },
      ],
    });
    expect(formatProgressReport(summary)).toEqual([
      "Running OMR jobs: 2",
      "Completed pages: 1 / 4 (25%)",
      "[done] page-01 - complete (2.0 KB)",
      "[busy] page-02 - processing (Predicting stems)",
      "[busy] page-03 - starting",
      "[wait] page-04 - waiting",
      "Estimated time remaining: ~36 minutes",
    ]);
  });

  it("reports completion once every page has output", () => {
    const summary = summarizeOmrProgress({
      pages: ["a", "b"],
      completedOutputs: new Map([
        ["a", 500],
        ["b", 3 * 1024 * 1024],
      ]),
      activeJobs: new Set(),
      logTails: new Map(),
    });
    expect(summary.done).toBe(true);
    expect(summary.estimatedMinutesRemaining).toBeNull();
    expect(formatProgressReport(summary).slice(2)).toEqual([
      "[done] a - complete (500 B)",
      "[done] b - complete (3.0 MB)",
      "All pages completed.",
    ]);
  });

  it("gives no estimate before the first page completes", () => {
    const summary = summarizeOmrProgress({
      pages: [],
      completedOutputs: new Map(),
      activeJobs: new Set(),
      logTails: new Map(),
    });
    expect(summary.percent).toBe(0);
    expect(summary.done).toBe(false);
    expect(formatProgressReport(summary)).toEqual([
      "Running OMR jobs: 0",
      "Completed pages: 0 / 0 (0%)",
    ]);
  });
});

describe("readOmrProgressSnapshot", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "keyshift-progress-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the status file, page outputs and log tails", async () => {
    const tracker = new OmrStatusTracker(dir, ["page-1", "page-2"]);
    tracker.markStarted("page-1");
    tracker.markStarted("page-2");
    tracker.markSettled("page-1");
    await tracker.flush();
    await mkdir(join(dir, "musicxml", "page-1"), { recursive: true });
    await writeFile(join(dir, "musicxml", "page-1", "page-1.musicxml"), "<score-partwise/>");
    await mkdir(join(dir, "logs"));
    await writeFile(join(dir, "logs", "page-2.log"), "loading\nrunning model\n\n");

    const snapshot = await readOmrProgressSnapshot(dir);

    expect(snapshot.pages).toEqual(["page-1", "page-2"]);
    expect([...snapshot.completedOutputs]).toEqual([["page-1", 17]]);
    expect([...snapshot.activeJobs]).toEqual(["page-2"]);
    expect([...snapshot.logTails]).toEqual([["page-2", "running model"]]);
  });

  it("treats a missing output directory as empty", async () => {
    const snapshot = await readOmrProgressSnapshot(join(dir, "missing"));
    expect(snapshot.pages).toEqual([]);
    expect(snapshot.activeJobs.size).toBe(0);
  });
});
