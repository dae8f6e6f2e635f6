import type { Pitch, Step } from "./interfaces";

const STEP_SEMITONES: Record<Step, number> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11,
};

// Position of each natural step on the line of fifths, F = -1 ... B = 5.
const STEP_FIFTHS: Record<Step, number> = {
  F: -1,
  C: 0,
  G: 1,
  D: 2,
  A: 3,
  E: 4,
  B: 5,
};

const STEPS_BY_FIFTHS: Step[] = ["F", "C", "G", "D", "A", "E", "B"];

export const MAX_KEY_FIFTHS = 7;

/**
 * Line-of-fifths position of a spelled pitch class: C = 0, G = 1, F# = 6, Bb = -2.
 */
export const pitchToFifths = (step: Step, alter: number): number =>
  STEP_FIFTHS[step] + 7 * alter;

export const fifthsToStepAlter = (fifths: number): { step: Step; alter: number } => {
  const index = (((fifths + 1) % 7) + 7) % 7;
  const step = STEPS_BY_FIFTHS[index];
  return { step, alter: (fifths - STEP_FIFTHS[step]) / 7 };
};

export const pitchToMidi = (pitch: Pitch): number =>
  (pitch.octave + 1) * 12 + STEP_SEMITONES[pitch.step] + pitch.alter;

/**
 * Spells `midi` at line-of-fifths position `fifths`. Both must describe the
 * same pitch class; the octave follows from the pair.
 */
export const spellPitch = (fifths: number, midi: number): Pitch => {
  let position = fifths;
  let spelled = fifthsToStepAlter(position);
  while (Math.abs(spelled.alter) > 2) {
    position += position > 0 ? -12 : 12;
    spelled = fifthsToStepAlter(position);
  }
  const octave = (midi - STEP_SEMITONES[spelled.step] - spelled.alter) / 12 - 1;
  return { step: spelled.step, alter: spelled.alter, octave: Math.round(octave) };
};

export const keySignatureAlterForStep = (fifths: number, step: string): number => {
  const sharps = ["F", "C", "G", "D", "A", "E", "B"];
  const flats = ["B", "E", "A", "D", "G", "C", "F"];
  const s = String(step || "").trim().toUpperCase();
  if (!s) return 0;
  const n = Math.max(-MAX_KEY_FIFTHS, Math.min(MAX_KEY_FIFTHS, Math.round(Number(fifths) || 0)));
  if (n > 0 && sharps.slice(0, n).includes(s)) return 1;
  if (n < 0 && flats.slice(0, Math.abs(n)).includes(s)) return -1;
  return 0;
};

export const accidentalTextFromAlter = (alter: number): string | null => {
  switch (Math.round(alter)) {
    case -2:
      return "flat-flat";
    case -1:
      return "flat";
    case 0:
      return "natural";
    case 1:
      return "sharp";
    case 2:
      return "double-sharp";
    default:
      return null;
  }
};

/**
 * Accidental to display for `pitch`, or "" when the key signature or an
 * earlier note in the measure already implies its alteration.
 */
export const resolveAccidentalTextForPitch = (
  pitch: Pitch,
  options: {
    keyFifths: number;
    previousAlterByPitchKey: Map<string, number>;
    pitchKey: string;
  }
): string => {
  const alter = Math.round(pitch.alter);
  const keyAlter = keySignatureAlterForStep(options.keyFifths, pitch.step);
  const activeAlter = options.previousAlterByPitchKey.get(options.pitchKey) ?? keyAlter;
  const accidentalText = alter !== activeAlter ? accidentalTextFromAlter(alter) ?? "" : "";
  options.previousAlterByPitchKey.set(options.pitchKey, alter);
  return accidentalText;
};
