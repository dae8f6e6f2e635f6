import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { runCli } from "../../src/ts/cli";
import { silentLogger, type Logger } from "../../src/ts/logger";
import { fixturePath } from "./fixtureLoader";

type Recorded = { code: string; message: string };

const recordingLogger = (): Logger & { recorded: Recorded[] } => {
  const recorded: Recorded[] = [];
  return {
    ...silentLogger,
    recorded,
    diagnostics: (_phase, diagnostics, warnings = []) => {
      recorded.push(...diagnostics, ...warnings);
    },
  };
};

describe("runCli", () => {
  let dir = "";
  let printed: string[] = [];
  const print = (line: string) => printed.push(line);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "keyshift-cli-"));
    printed = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints usage for --help", async () => {
    expect(await runCli(["--help"], { print, env: {} })).toBe(0);
    expect(printed[0].startsWith("Usage:")).toBe(true);
  });

  it("exits with a usage error without a command", async () => {
    expect(await runCli([], { print, env: {} })).toBe(2);
    expect(await runCli(["frobnicate"], { print, env: {}, logger: silentLogger })).toBe(2);
    expect(printed[1].startsWith('Unknown command "frobnicate".')).toBe(true);
  });

  it("rejects unknown options", async () => {
    expect(await runCli(["transpose", "--bogus"], { print, env: {} })).toBe(2);
  });

  it("transposes a file", async () => {
    const output = join(dir, "out.musicxml");

    const code = await runCli(
      ["transpose", fixturePath("key-change.musicxml"), "--from", "3", "-o", output],
      { print, env: {}, logger: silentLogger }
    );

    expect(code).toBe(0);
    expect(await readFile(output, "utf-8")).toContain("<fifths>-1</fifths>");
  });

  it("reports failures as diagnostics", async () => {
    const logger = recordingLogger();

    const code = await runCli(
      ["transpose", fixturePath("key-change.musicxml"), "--interval", "Q9", "-o", join(dir, "x.musicxml")],
      { print, env: {}, logger }
    );

    expect(code).toBe(1);
    expect(logger.recorded.map((d) => d.code)).toEqual(["INVALID_INTERVAL"]);
  });

  it("validates combine options", async () => {
    const logger = recordingLogger();

    const code = await runCli(["combine", fixturePath("page_1.musicxml")], {
      print,
      env: {},
      logger,
    });

    expect(code).toBe(1);
    expect(logger.recorded).toEqual([
      { code: "INVALID_CONFIG", message: "Invalid options: output: Required" },
    ]);
  });

  it("prints the progress of an output directory", async () => {
    expect(await runCli(["progress", dir], { print, env: {}, logger: silentLogger })).toBe(0);
    expect(printed).toEqual(["Running OMR jobs: 0", "Completed pages: 0 / 0 (0%)"]);
  });
});
