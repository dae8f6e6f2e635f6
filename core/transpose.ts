import {
  MAX_KEY_FIFTHS,
  pitchToFifths,
  pitchToMidi,
  spellPitch,
} from "./accidentalSpelling";
import type { Interval, Pitch } from "./interfaces";

export type KeyShift = {
  /** Written key after the shift. */
  fifths: number;
  /**
   * Enharmonic correction (a multiple of 12 on the line of fifths) applied on
   * top of the interval so notes spell consistently with the written key.
   */
  enharmonicAdjust: number;
};

/**
 * Shifts a key by `interval`. Keys that leave the [-7, 7] range are respelled
 * enharmonically (F# major down a minor second is F major, not E# major).
 * With `writtenFifths`, that key is written instead and the adjustment is the
 * one that brings the shifted key closest to it.
 */
export const shiftKey = (fifths: number, interval: Interval, writtenFifths?: number): KeyShift => {
  const raw = fifths + interval.fifths;
  if (typeof writtenFifths === "number") {
    const adjust = 12 * Math.round((writtenFifths - raw) / 12);
    return { fifths: writtenFifths, enharmonicAdjust: adjust || 0 };
  }
  let adjust = 0;
  while (raw + adjust > MAX_KEY_FIFTHS) adjust -= 12;
  while (raw + adjust < -MAX_KEY_FIFTHS) adjust += 12;
  return { fifths: raw + adjust, enharmonicAdjust: adjust };
};

export const transposeKeyFifths = (fifths: number, interval: Interval): number =>
  shiftKey(fifths, interval).fifths;

/**
 * Moves `pitch` by exactly `interval`. Fractional (microtonal) alters keep
 * their fraction on top of the respelled whole-step alteration.
 */
export const transposePitch = (pitch: Pitch, interval: Interval, enharmonicAdjust = 0): Pitch => {
  const wholeAlter = Math.round(pitch.alter);
  const fraction = pitch.alter - wholeAlter;
  const whole: Pitch = { step: pitch.step, alter: wholeAlter, octave: pitch.octave };
  const fifths = pitchToFifths(whole.step, whole.alter) + interval.fifths + enharmonicAdjust;
  const midi = pitchToMidi(whole) + interval.semitones;
  const spelled = spellPitch(fifths, midi);
  return fraction === 0 ? spelled : { ...spelled, alter: spelled.alter + fraction };
};
