import { readFile, readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { sortFragmentSources } from "../../core/ScoreCombiner";
import { isFragmentPath } from "./score-io";

export const OMR_STATUS_FILE = "omr-status.json";
export const MINUTES_PER_PAGE_ESTIMATE = 12;

export type OmrProgressSnapshot = {
  pages: readonly string[];
  /** Page label -> size in bytes of the MusicXML the engine wrote. */
  completedOutputs: ReadonlyMap<string, number>;
  activeJobs: ReadonlySet<string>;
  /** Page label -> last non-empty line of its engine log. */
  logTails: ReadonlyMap<string, string>;
};

export type PageStatus = "complete" | "processing" | "starting" | "waiting";

export type PageProgress = {
  page: string;
  status: PageStatus;
  detail: string;
};

export type OmrProgressSummary = {
  total: number;
  completed: number;
  running: number;
  percent: number;
  done: boolean;
  estimatedMinutesRemaining: number | null;
  pages: PageProgress[];
};

const formatBytes = (bytes: number): string => {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
};

export const summarizeOmrProgress = (snapshot: OmrProgressSnapshot): OmrProgressSummary => {
  const pages = snapshot.pages.map((page): PageProgress => {
    const size = snapshot.completedOutputs.get(page);
    if (size !== undefined) {
      return { page, status: "complete", detail: formatBytes(size) };
    }
    if (snapshot.activeJobs.has(page)) {
      const tail = snapshot.logTails.get(page);
      return tail
        ? { page, status: "processing", detail: tail }
        : { page, status: "starting", detail: "" };
    }
    return { page, status: "waiting", detail: "" };
  });

  const total = pages.length;
  const completed = pages.filter((page) => page.status === "complete").length;
  const running = pages.filter(
    (page) => page.status === "processing" || page.status === "starting"
  ).length;
  const done = total > 0 && completed === total;
  return {
    total,
    completed,
    running,
    percent: total > 0 ? Math.floor((completed * 100) / total) : 0,
    done,
    estimatedMinutesRemaining:
      !done && completed > 0 ? (total - completed) * MINUTES_PER_PAGE_ESTIMATE : null,
    pages,
  };
};

const STATUS_MARKS: Record<PageStatus, string> = {
  complete: "done",
  processing: "busy",
  starting: "busy",
  waiting: "wait",
};

export const formatProgressReport = (summary: OmrProgressSummary): string[] => {
  const lines = [
    `Running OMR jobs: ${summary.running}`,
    `Completed pages: ${summary.completed} / ${summary.total} (${summary.percent}%)`,
  ];
  for (const page of summary.pages) {
    const detail = page.detail ? ` (${page.detail})` : "";
    lines.push(`[${STATUS_MARKS[page.status]}] ${page.page} - ${page.status}${detail}`);
  }
  if (summary.done) {
    lines.push("All pages completed.");
  } else if (summary.estimatedMinutesRemaining !== null) {
    lines.push(`Estimated time remaining: ~${summary.estimatedMinutesRemaining} minutes`);
  }
  return lines;
};

const omrStatusSchema = z.object({
  pages: z.array(z.string()),
  active: z.array(z.string()),
});

export type OmrStatus = z.infer<typeof omrStatusSchema>;

/**
 * Keeps OMR_STATUS_FILE in step with the pool. Writes are serialized; call
 * `flush` to wait for the last one.
 */
export class OmrStatusTracker {
  private readonly active = new Set<string>();
  private pending: Promise<void> = Promise.resolve();

  public constructor(
    private readonly outputDir: string,
    private readonly pages: readonly string[]
  ) {}

  public markStarted(page: string): void {
    this.active.add(page);
    this.persist();
  }

  public markSettled(page: string): void {
    this.active.delete(page);
    this.persist();
  }

  public flush(): Promise<void> {
    return this.pending;
  }

  private persist(): void {
    const status: OmrStatus = { pages: [...this.pages], active: [...this.active] };
    const path = join(this.outputDir, OMR_STATUS_FILE);
    this.pending = this.pending.then(() => writeFile(path, JSON.stringify(status, null, 2), "utf-8"));
  }
}

const readOptionalText = async (path: string): Promise<string | null> => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }
};

const isMissingFile = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const readCompletedSize = async (pageDir: string): Promise<number | undefined> => {
  let names: string[];
  try {
    names = await readdir(pageDir);
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
  const [first] = sortFragmentSources(names.filter(isFragmentPath));
  if (!first) return undefined;
  return (await stat(join(pageDir, first))).size;
};

/**
 * Builds a snapshot from a pipeline output directory: the status file the
 * pool keeps, the MusicXML written per page and the per-page logs.
 */
export const readOmrProgressSnapshot = async (outputDir: string): Promise<OmrProgressSnapshot> => {
  const statusText = await readOptionalText(join(outputDir, OMR_STATUS_FILE));
  const status: OmrStatus = statusText
    ? omrStatusSchema.parse(JSON.parse(statusText))
    : { pages: [], active: [] };

  const completedOutputs = new Map<string, number>();
  const logTails = new Map<string, string>();
  for (const page of status.pages) {
    const size = await readCompletedSize(join(outputDir, "musicxml", page));
    if (size !== undefined) completedOutputs.set(page, size);
    const log = await readOptionalText(join(outputDir, "logs", `${page}.log`));
    const tail = log?.split(/\r?\n/).map((line) => line.trim()).filter(Boolean).pop();
    if (tail) logTails.set(page, tail);
  }

  return {
    pages: status.pages,
    completedOutputs,
    activeJobs: new Set(status.active),
    logTails,
  };
};
