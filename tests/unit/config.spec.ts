import { describe, expect, it } from "vitest";
import { ConfigError } from "../../core/errors";
import {
  parseConfig,
  pipelineConfigSchema,
  readEnvDefaults,
  transposeConfigSchema,
} from "../../src/ts/config";

describe("parseConfig", () => {
  it("fills transform defaults", () => {
    const config = parseConfig(transposeConfigSchema, {
      input: "in.musicxml",
      output: "out.musicxml",
    });
    expect(config).toEqual({
      input: "in.musicxml",
      output: "out.musicxml",
      fromMeasure: 20,
      interval: "-m2",
      minFifths: 5,
      lyricsPart: 1,
    });
  });

  it("coerces option strings", () => {
    const config = parseConfig(transposeConfigSchema, {
      input: "in.musicxml",
      output: "out.musicxml",
      fromMeasure: "12",
      keyFifths: "-4",
      lyricsPart: "2",
    });
    expect(config.fromMeasure).toBe(12);
    expect(config.keyFifths).toBe(-4);
    expect(config.lyricsPart).toBe(2);
  });

  it("accepts auto as the threshold", () => {
    const config = parseConfig(transposeConfigSchema, {
      input: "in.musicxml",
      output: "out.musicxml",
      fromMeasure: "auto",
    });
    expect(config.fromMeasure).toBe("auto");
  });

  it("fills pipeline defaults and reads the environment", () => {
    const config = parseConfig(
      pipelineConfigSchema,
      { input: "score.pdf" },
      { KEYSHIFT_INTERVAL: "M2", KEYSHIFT_CONCURRENCY: "4" }
    );
    expect(config.interval).toBe("M2");
    expect(config.concurrency).toBe(4);
    expect(config.outputDir).toBe("./output");
    expect(config.skipPages).toBe(1);
    expect(config.staggerMs).toBe(10000);
    expect(config.dpi).toBe(300);
    expect(config.skipRender).toBe(false);
    expect(config.omrCommand).toBe("oemer {input} -o {outputDir}");
  });

  it("prefers explicit values over the environment", () => {
    const config = parseConfig(
      pipelineConfigSchema,
      { input: "score.pdf", interval: "P5", concurrency: undefined },
      { KEYSHIFT_INTERVAL: "M2", KEYSHIFT_CONCURRENCY: "3" }
    );
    expect(config.interval).toBe("P5");
    expect(config.concurrency).toBe(3);
  });

  it("reports every invalid option", () => {
    expect(() =>
      parseConfig(pipelineConfigSchema, { input: "score.pdf", concurrency: "0" })
    ).toThrow("Invalid options: concurrency: Number must be greater than or equal to 1");
    expect(() => parseConfig(pipelineConfigSchema, {})).toThrow("Invalid options: input: Required");
    expect(() =>
      parseConfig(transposeConfigSchema, { input: "a", output: "b", keyFifths: "9" })
    ).toThrow(ConfigError);
  });

  it("rejects a negative threshold", () => {
    expect(() =>
      parseConfig(transposeConfigSchema, { input: "a", output: "b", fromMeasure: "-3" })
    ).toThrow(/fromMeasure/);
  });

  it("rejects a blank number instead of reading it as 0", () => {
    expect(() =>
      parseConfig(transposeConfigSchema, { input: "a", output: "b", fromMeasure: "" })
    ).toThrow("Invalid options: fromMeasure: Expected a number, received an empty value");
    expect(() =>
      parseConfig(transposeConfigSchema, { input: "a", output: "b", keyFifths: " " })
    ).toThrow("Invalid options: keyFifths: Expected a number, received an empty value");
  });
});

describe("readEnvDefaults", () => {
  it("maps known variables and ignores blank ones", () => {
    expect(
      readEnvDefaults({
        KEYSHIFT_FROM_MEASURE: " 8 ",
        KEYSHIFT_OMR_COMMAND: "",
        UNRELATED: "x",
      })
    ).toEqual({ fromMeasure: "8" });
  });
});
