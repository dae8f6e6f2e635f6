import { parseArgs } from "node:util";
import { toDiagnostic } from "../../core/errors";
import {
  combineConfigSchema,
  parseConfig,
  pipelineConfigSchema,
  progressConfigSchema,
  transposeConfigSchema,
} from "./config";
import { execFileRunner, type CommandRunner } from "./external-tools";
import { createConsoleLogger, type Logger } from "./logger";
import { runCombineFlow, runPipeline, runTransposeFlow } from "./pipeline-flow";
import { formatProgressReport, readOmrProgressSnapshot, summarizeOmrProgress } from "./progress";

const USAGE = `Usage:
  keyshift run <input.pdf> [--out DIR] [transform options] [--skip-pages N]
               [--concurrency N] [--stagger-ms N] [--dpi N] [--skip-render]
  keyshift combine <fragment.musicxml|dir>... --output FILE
  keyshift transpose <input.musicxml> [--output FILE] [transform options]
  keyshift progress [DIR]

Transform options:
  --from N|auto      first measure number to shift (default 20; "auto" finds
                     the first key with --min-sharps sharps, default 5)
  --interval I       interval such as -m2, P5, -M3 or a semitone count (default -m2)
  --key F            write this key (-7..7) in the shifted section
  --lyrics FILE      attach the syllables in FILE to --lyrics-part (default 1)

Values that start with "-" take the --option=value form (--interval=-m2).
Other options: --quiet, --help`;

export type CliDeps = {
  runner?: CommandRunner;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  print?: (line: string) => void;
};

const CLI_OPTIONS = {
  out: { type: "string" },
  output: { type: "string", short: "o" },
  from: { type: "string" },
  interval: { type: "string" },
  key: { type: "string" },
  "min-sharps": { type: "string" },
  lyrics: { type: "string" },
  "lyrics-part": { type: "string" },
  "skip-pages": { type: "string" },
  concurrency: { type: "string" },
  "stagger-ms": { type: "string" },
  dpi: { type: "string" },
  "skip-render": { type: "boolean" },
  quiet: { type: "boolean", short: "q" },
  help: { type: "boolean", short: "h" },
} as const;

const parseCliArgs = (argv: string[]) =>
  parseArgs({ args: argv, options: CLI_OPTIONS, allowPositionals: true, strict: true });

/**
 * Runs one CLI invocation and resolves to the process exit code.
 */
export const runCli = async (argv: string[], deps: CliDeps = {}): Promise<number> => {
  const print = deps.print ?? ((line: string) => console.log(line));
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    print(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 2;
  }
  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;
  if (values.help || !command) {
    print(USAGE);
    return values.help ? 0 : 2;
  }

  const logger = deps.logger ?? createConsoleLogger({ quiet: values.quiet });
  const env = deps.env ?? process.env;
  const runner = deps.runner ?? execFileRunner;
  const transformValues = {
    fromMeasure: values.from,
    interval: values.interval,
    keyFifths: values.key,
    minFifths: values["min-sharps"],
    lyricsFile: values.lyrics,
    lyricsPart: values["lyrics-part"],
  };

  try {
    if (command === "run") {
      const config = parseConfig(
        pipelineConfigSchema,
        {
          ...transformValues,
          input: rest[0],
          outputDir: values.out,
          skipPages: values["skip-pages"],
          concurrency: values.concurrency,
          staggerMs: values["stagger-ms"],
          dpi: values.dpi,
          skipRender: values["skip-render"],
        },
        env
      );
      const result = await runPipeline(config, { runner, logger });
      logger.info("cli", `Output: ${result.pdfPath ?? result.transposedPath}`);
      return 0;
    }
    if (command === "combine") {
      const config = parseConfig(combineConfigSchema, { inputs: rest, output: values.output }, env);
      await runCombineFlow(config, { logger });
      return 0;
    }
    if (command === "transpose") {
      const config = parseConfig(
        transposeConfigSchema,
        {
          ...transformValues,
          input: rest[0],
          output: values.output ?? "output_transposed.musicxml",
        },
        env
      );
      await runTransposeFlow(config, { logger });
      return 0;
    }
    if (command === "progress") {
      const config = parseConfig(progressConfigSchema, { outputDir: rest[0] ?? values.out }, env);
      const summary = summarizeOmrProgress(await readOmrProgressSnapshot(config.outputDir));
      formatProgressReport(summary).forEach((line) => print(line));
      return 0;
    }
    print(`Unknown command "${command}".\n\n${USAGE}`);
    return 2;
  } catch (error) {
    logger.diagnostics(command === "combine" ? "combine" : "cli", [toDiagnostic(error)]);
    return 1;
  }
};
