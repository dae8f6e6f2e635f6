import { mkdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { EmptyInputError, ExternalToolError } from "../../core/errors";
import type { CombineResult, Interval, TransposeResult } from "../../core/interfaces";
import { parseInterval } from "../../core/interval";
import { applyLyrics } from "../../core/lyrics";
import { combineScoreFragments } from "../../core/ScoreCombiner";
import { findKeyChangeMeasure, transposeSection } from "../../core/SectionTransposer";
import type { CombineConfig, PipelineConfig, TransformConfig, TransposeConfig } from "./config";
import {
  pageLabelFromImage,
  rasterizePdf,
  recognizePage,
  renderScore,
  type CommandRunner,
} from "./external-tools";
import type { Logger } from "./logger";
import { OmrStatusTracker } from "./progress";
import {
  collectFragmentPaths,
  readScoreFile,
  readScoreFragment,
  writeScoreFile,
} from "./score-io";
import { runTaskPool, type TaskOutcome } from "./task-pool";

export type FlowDeps = {
  runner: CommandRunner;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export type TransformOutcome = {
  fromMeasure: number | null;
  transpose: TransposeResult | null;
  lyricsAssigned: number;
};

export type PipelineResult = {
  combinedPath: string;
  transposedPath: string;
  pdfPath: string | null;
  partCount: number;
  transform: TransformOutcome;
};

const summarizeCombine = (result: CombineResult, fragmentCount: number): string =>
  `Combined ${fragmentCount} fragment(s) into ${result.partCount} part(s); appended ${result.measuresAppended} measure(s).`;

/**
 * Shifts the section (explicit threshold, or the first sharp key change when
 * `fromMeasure` is "auto") and then applies lyrics, in place.
 */
export const applyTransform = async (
  doc: XMLDocument,
  config: TransformConfig,
  interval: Interval,
  logger: Logger
): Promise<TransformOutcome> => {
  const fromMeasure =
    config.fromMeasure === "auto"
      ? findKeyChangeMeasure(doc, { minFifths: config.minFifths })
      : config.fromMeasure;

  let transpose: TransposeResult | null = null;
  if (fromMeasure === null) {
    logger.warn(
      "transpose",
      `No key signature with ${config.minFifths} or more sharps was found; nothing was transposed.`
    );
  } else {
    transpose = transposeSection(doc, { fromMeasure, interval, keyFifths: config.keyFifths });
    for (const report of transpose.partReports) {
      logger.info(
        "transpose",
        `Part ${report.partIndex + 1}${report.partId ? ` (${report.partId})` : ""}: transposed ${report.transposedMeasureCount} measure(s) from measure ${fromMeasure} by ${interval.name}, rewrote ${report.keySignaturesRewritten} key signature(s), removed ${report.keySignaturesRemoved}.`
      );
    }
    logger.diagnostics("transpose", [], transpose.warnings);
  }

  let lyricsAssigned = 0;
  if (config.lyricsFile) {
    const text = await readFile(config.lyricsFile, "utf-8");
    const lyrics = applyLyrics(doc, text, { partIndex: config.lyricsPart - 1 });
    lyricsAssigned = lyrics.assigned;
    logger.info("lyrics", `Added ${lyrics.assigned} syllable(s) to part ${config.lyricsPart}.`);
    logger.diagnostics("lyrics", [], lyrics.warnings);
  }

  return { fromMeasure, transpose, lyricsAssigned };
};

export const runCombineFlow = async (
  config: CombineConfig,
  deps: Pick<FlowDeps, "logger">
): Promise<CombineResult> => {
  const paths = await collectFragmentPaths(config.inputs);
  const fragments = await Promise.all(paths.map((path) => readScoreFragment(path)));
  const result = combineScoreFragments(fragments);
  deps.logger.info("combine", summarizeCombine(result, fragments.length));
  deps.logger.diagnostics("combine", [], result.warnings);
  await writeScoreFile(config.output, result.doc);
  deps.logger.info("combine", `Saved ${config.output}`);
  return result;
};

export const runTransposeFlow = async (
  config: TransposeConfig,
  deps: Pick<FlowDeps, "logger">
): Promise<TransformOutcome> => {
  const interval = parseInterval(config.interval);
  const doc = await readScoreFile(config.input);
  const outcome = await applyTransform(doc, config, interval, deps.logger);
  await writeScoreFile(config.output, doc);
  deps.logger.info("transpose", `Saved ${config.output}`);
  return outcome;
};

type FailedOutcome = Extract<TaskOutcome<string>, { ok: false }>;

/**
 * PDF -> page images -> per-page MusicXML -> combined score -> shifted score
 * -> PDF. Any page the OMR engine fails on halts the run before combining.
 */
export const runPipeline = async (config: PipelineConfig, deps: FlowDeps): Promise<PipelineResult> => {
  const { logger, runner } = deps;
  const interval = parseInterval(config.interval);

  const pagesDir = join(config.outputDir, "pages");
  const musicXmlDir = join(config.outputDir, "musicxml");
  const logsDir = join(config.outputDir, "logs");
  await mkdir(musicXmlDir, { recursive: true });
  await mkdir(logsDir, { recursive: true });

  logger.info("rasterize", `Converting ${config.input} to images at ${config.dpi} dpi...`);
  const images = await rasterizePdf({
    runner,
    template: config.rasterizeCommand,
    pdfPath: config.input,
    pagesDir,
    dpi: config.dpi,
  });
  const musicImages = images.slice(config.skipPages);
  if (musicImages.length === 0) {
    throw new EmptyInputError(
      `No music pages remain after skipping ${config.skipPages} of ${images.length} page(s).`
    );
  }
  logger.info("rasterize", `${images.length} page(s); running OMR on ${musicImages.length}.`);

  const labels = musicImages.map(pageLabelFromImage);
  const tracker = new OmrStatusTracker(config.outputDir, labels);
  const tasks = musicImages.map((imagePath, index) => () =>
    recognizePage({
      runner,
      template: config.omrCommand,
      imagePath,
      pageDir: join(musicXmlDir, labels[index]),
      logPath: join(logsDir, `${labels[index]}.log`),
    })
  );
  const outcomes = await runTaskPool(tasks, {
    concurrency: config.concurrency,
    staggerMs: config.staggerMs,
    sleep: deps.sleep,
    onStart: (index) => {
      logger.info("omr", `Processing ${labels[index]}...`);
      tracker.markStarted(labels[index]);
    },
    onSettle: (outcome) => tracker.markSettled(labels[outcome.index]),
  });
  await tracker.flush();

  const failures = outcomes.filter((outcome): outcome is FailedOutcome => !outcome.ok);
  if (failures.length > 0) {
    logger.diagnostics(
      "omr",
      failures.map((failure) => ({
        code: "EXTERNAL_TOOL_FAILED",
        message: `${labels[failure.index]}: ${failure.error.message}`,
      }))
    );
    throw new ExternalToolError(
      config.omrCommand,
      `OMR failed for ${failures.map((failure) => labels[failure.index]).join(", ")}.`,
      { cause: failures[0].error }
    );
  }

  const fragmentPaths = outcomes.flatMap((outcome) => (outcome.ok ? [outcome.value] : []));
  const fragments = await Promise.all(fragmentPaths.map((path) => readScoreFragment(path)));
  const combined = combineScoreFragments(fragments);
  logger.info("combine", summarizeCombine(combined, fragments.length));
  logger.diagnostics("combine", [], combined.warnings);
  const combinedPath = join(config.outputDir, "combined.musicxml");
  await writeScoreFile(combinedPath, combined.doc);

  const transform = await applyTransform(combined.doc, config, interval, logger);
  const transposedPath = join(config.outputDir, "transposed.musicxml");
  await writeScoreFile(transposedPath, combined.doc);
  logger.info("transpose", `Saved ${transposedPath}`);

  let pdfPath: string | null = null;
  if (!config.skipRender) {
    pdfPath = join(config.outputDir, "final_output.pdf");
    logger.info("render", `Rendering ${pdfPath}...`);
    await renderScore({ runner, template: config.renderCommand, input: transposedPath, output: pdfPath });
  }

  return {
    combinedPath,
    transposedPath,
    pdfPath,
    partCount: combined.partCount,
    transform,
  };
};
