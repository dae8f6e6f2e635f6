import { InvalidIntervalError } from "./errors";
import { pitchToFifths } from "./accidentalSpelling";
import type { Interval, Step } from "./interfaces";

const SIMPLE_STEPS: Step[] = ["C", "D", "E", "F", "G", "A", "B"];
const SIMPLE_SEMITONES = [0, 2, 4, 5, 7, 9, 11];
const PERFECT_SIMPLE_NUMBERS = new Set([0, 3, 4]);

// Spelling used when an interval is given as a bare semitone count.
const SEMITONE_NAMES = ["P1", "m2", "M2", "m3", "M3", "P4", "d5", "P5", "m6", "M6", "m7", "M7"];

const NAMED_INTERVAL = /^([+-]?)(P|M|m|A+|d+)(\d+)$/;
const SEMITONE_INTERVAL = /^([+-]?)(\d+)$/;

export const parseInterval = (text: string): Interval => {
  const raw = String(text ?? "").trim();
  const named = NAMED_INTERVAL.exec(raw);
  if (named) {
    const [, sign, quality, numberText] = named;
    return buildInterval(raw, sign === "-" ? -1 : 1, quality, Number(numberText));
  }
  const semitoneMatch = SEMITONE_INTERVAL.exec(raw);
  if (semitoneMatch) {
    const [, sign, countText] = semitoneMatch;
    const count = Number(countText);
    const simpleName = SEMITONE_NAMES[count % 12];
    const octaves = Math.floor(count / 12);
    const quality = simpleName.slice(0, 1);
    const generic = Number(simpleName.slice(1)) + 7 * octaves;
    return buildInterval(raw, sign === "-" && count !== 0 ? -1 : 1, quality, generic);
  }
  throw new InvalidIntervalError(raw, "expected a name such as -m2, P5, M3 or a semitone count.");
};

export const resolveInterval = (value: string | Interval): Interval =>
  typeof value === "string" ? parseInterval(value) : value;

export const invertInterval = (interval: Interval): Interval => ({
  name: interval.name.startsWith("-") ? interval.name.slice(1) : `-${interval.name}`,
  diatonicSteps: -interval.diatonicSteps,
  semitones: -interval.semitones,
  fifths: -interval.fifths,
});

export const isUnison = (interval: Interval): boolean =>
  interval.diatonicSteps === 0 && interval.semitones === 0;

const buildInterval = (
  raw: string,
  direction: 1 | -1,
  quality: string,
  generic: number
): Interval => {
  if (!Number.isInteger(generic) || generic < 1) {
    throw new InvalidIntervalError(raw, "interval number must be 1 or greater.");
  }
  const simple = (generic - 1) % 7;
  const octaves = Math.floor((generic - 1) / 7);
  const offset = qualityOffset(raw, quality, PERFECT_SIMPLE_NUMBERS.has(simple));
  const semitones = SIMPLE_SEMITONES[simple] + offset + 12 * octaves;
  const fifths = pitchToFifths(SIMPLE_STEPS[simple], offset);
  const name = `${direction < 0 ? "-" : ""}${quality}${generic}`;
  return {
    name,
    diatonicSteps: direction * (simple + 7 * octaves),
    semitones: direction * semitones,
    fifths: direction * fifths || 0,
  };
};

const qualityOffset = (raw: string, quality: string, perfectType: boolean): number => {
  if (quality === "P") {
    if (!perfectType) throw new InvalidIntervalError(raw, "only unisons, fourths, fifths and octaves are perfect.");
    return 0;
  }
  if (quality === "M" || quality === "m") {
    if (perfectType) throw new InvalidIntervalError(raw, "unisons, fourths, fifths and octaves cannot be major or minor.");
    return quality === "M" ? 0 : -1;
  }
  if (quality.startsWith("A")) return quality.length;
  // Diminished: one below minor for major-type intervals, one below perfect otherwise.
  return perfectType ? -quality.length : -quality.length - 1;
};
