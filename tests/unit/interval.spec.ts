import { describe, expect, it } from "vitest";
import { InvalidIntervalError } from "../../core/errors";
import { invertInterval, isUnison, parseInterval, resolveInterval } from "../../core/interval";

describe("parseInterval", () => {
  it("parses a descending minor second", () => {
    expect(parseInterval("-m2")).toEqual({
      name: "-m2",
      diatonicSteps: -1,
      semitones: -1,
      fifths: 5,
    });
  });

  it("parses perfect, major and compound intervals", () => {
    expect(parseInterval("P5")).toEqual({ name: "P5", diatonicSteps: 4, semitones: 7, fifths: 1 });
    expect(parseInterval("M3")).toEqual({ name: "M3", diatonicSteps: 2, semitones: 4, fifths: 4 });
    expect(parseInterval("P8")).toEqual({ name: "P8", diatonicSteps: 7, semitones: 12, fifths: 0 });
    expect(parseInterval(" +M2 ")).toEqual({ name: "M2", diatonicSteps: 1, semitones: 2, fifths: 2 });
  });

  it("parses augmented and diminished qualities", () => {
    expect(parseInterval("A4")).toEqual({ name: "A4", diatonicSteps: 3, semitones: 6, fifths: 6 });
    expect(parseInterval("d5")).toEqual({ name: "d5", diatonicSteps: 4, semitones: 6, fifths: -6 });
  });

  it("reads a bare semitone count with its default spelling", () => {
    expect(parseInterval("-1")).toEqual(parseInterval("-m2"));
    expect(parseInterval("7")).toEqual(parseInterval("P5"));
    expect(parseInterval("13")).toEqual({ name: "m9", diatonicSteps: 8, semitones: 13, fifths: -5 });
  });

  it("treats zero semitones as the unison", () => {
    const unison = parseInterval("0");
    expect(unison).toEqual({ name: "P1", diatonicSteps: 0, semitones: 0, fifths: 0 });
    expect(isUnison(unison)).toBe(true);
    expect(isUnison(parseInterval("P8"))).toBe(false);
  });

  it("rejects qualities that do not fit the interval number", () => {
    expect(() => parseInterval("P3")).toThrow(
      'Invalid interval "P3": only unisons, fourths, fifths and octaves are perfect.'
    );
    expect(() => parseInterval("M5")).toThrow(InvalidIntervalError);
  });

  it("rejects malformed text", () => {
    expect(() => parseInterval("m0")).toThrow(
      'Invalid interval "m0": interval number must be 1 or greater.'
    );
    expect(() => parseInterval("down a step")).toThrow(InvalidIntervalError);
    expect(() => parseInterval("")).toThrow(InvalidIntervalError);
  });
});

describe("invertInterval", () => {
  it("flips direction and name", () => {
    expect(invertInterval(parseInterval("-m2"))).toEqual({
      name: "m2",
      diatonicSteps: 1,
      semitones: 1,
      fifths: -5,
    });
    expect(invertInterval(parseInterval("P5")).name).toBe("-P5");
  });
});

describe("resolveInterval", () => {
  it("passes an already parsed interval through", () => {
    const interval = parseInterval("M2");
    expect(resolveInterval(interval)).toBe(interval);
    expect(resolveInterval("M2")).toEqual(interval);
  });
});
