import { execFile } from "node:child_process";
import { mkdir, readdir, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { promisify } from "node:util";
import { ConfigError, ExternalToolError } from "../../core/errors";
import { sortFragmentSources } from "../../core/ScoreCombiner";
import { isFragmentPath } from "./score-io";

const execFileAsync = promisify(execFile);

const PLACEHOLDER = /\{([a-zA-Z]+)\}/g;

export type CommandResult = {
  stdout: string;
  stderr: string;
};

/**
 * Runs one external program without a shell. Rejects with
 * ExternalToolError when the program cannot start or exits non-zero.
 */
export type CommandRunner = (file: string, args: string[]) => Promise<CommandResult>;

export type CommandLine = {
  file: string;
  args: string[];
};

const readStderr = (error: unknown): string => {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    return String(error.stderr ?? "");
  }
  return error instanceof Error ? error.message : String(error);
};

export const execFileRunner: CommandRunner = async (file, args) => {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      maxBuffer: 64 * 1024 * 1024,
      encoding: "utf-8",
    });
    return { stdout, stderr };
  } catch (error) {
    throw new ExternalToolError([file, ...args].join(" "), readStderr(error), { cause: error });
  }
};

/**
 * Splits a command template on whitespace, then fills `{name}` placeholders
 * inside each word, so substituted paths may contain spaces.
 */
export const expandCommand = (template: string, values: Record<string, string>): CommandLine => {
  const words = template.trim().split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    throw new ConfigError("Command template is empty.");
  }
  const expanded = words.map((word) =>
    word.replace(PLACEHOLDER, (_match, name: string) => {
      const value = values[name];
      if (value === undefined) {
        throw new ConfigError(`Unknown placeholder {${name}} in command template "${template}".`);
      }
      return value;
    })
  );
  const [file, ...args] = expanded;
  return { file, args };
};

const runTemplate = (
  runner: CommandRunner,
  template: string,
  values: Record<string, string>
): Promise<CommandResult> => {
  const { file, args } = expandCommand(template, values);
  return runner(file, args);
};

export const pageLabelFromImage = (imagePath: string): string =>
  basename(imagePath, extname(imagePath));

/**
 * Rasterizes every page of `pdfPath` into `pagesDir` and returns the page
 * images in page order.
 */
export const rasterizePdf = async (params: {
  runner: CommandRunner;
  template: string;
  pdfPath: string;
  pagesDir: string;
  dpi: number;
}): Promise<string[]> => {
  await mkdir(params.pagesDir, { recursive: true });
  await runTemplate(params.runner, params.template, {
    input: params.pdfPath,
    outputDir: params.pagesDir,
    dpi: String(params.dpi),
  });
  const entries = await readdir(params.pagesDir);
  const images = entries
    .filter((name) => extname(name).toLowerCase() === ".png")
    .map((name) => join(params.pagesDir, name));
  return sortFragmentSources(images);
};

/**
 * Runs the OMR engine on one page image and returns the MusicXML file it
 * wrote into `pageDir`. The engine's output is kept in `logPath`.
 */
export const recognizePage = async (params: {
  runner: CommandRunner;
  template: string;
  imagePath: string;
  pageDir: string;
  logPath: string;
}): Promise<string> => {
  await mkdir(params.pageDir, { recursive: true });
  const result = await runTemplate(params.runner, params.template, {
    input: params.imagePath,
    outputDir: params.pageDir,
  });
  await writeFile(params.logPath, `${result.stdout}${result.stderr}`, "utf-8");

  const written = (await readdir(params.pageDir)).filter(isFragmentPath);
  const [first] = sortFragmentSources(written);
  if (!first) {
    throw new ExternalToolError(
      `${params.template} (${params.imagePath})`,
      "no MusicXML file was written for this page."
    );
  }
  return join(params.pageDir, first);
};

export const renderScore = async (params: {
  runner: CommandRunner;
  template: string;
  input: string;
  output: string;
}): Promise<void> => {
  await runTemplate(params.runner, params.template, {
    input: params.input,
    output: params.output,
  });
};
