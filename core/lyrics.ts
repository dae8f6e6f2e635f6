import type { LyricsOptions, LyricsResult } from "./interfaces";
import {
  getDirectChildren,
  insertLyric,
  isChordFollower,
  isRestOrUnpitched,
  listMeasures,
  listParts,
  readPitch,
} from "./xmlUtils";

type Syllabic = "single" | "begin" | "middle" | "end";

export type Syllable = {
  text: string;
  syllabic: Syllabic;
};

/**
 * Splits lyric text into syllables. A trailing hyphen ("riv- er") marks a
 * word that continues on the next syllable.
 */
export const splitSyllables = (text: string): Syllable[] => {
  const tokens = String(text ?? "")
    .split(/\s+/)
    .map((token) => token.trim())
    .filter((token) => token.length > 0 && token !== "-");
  const syllables: Syllable[] = [];
  let continuing = false;
  for (const token of tokens) {
    const continues = token.length > 1 && token.endsWith("-");
    const syllabic: Syllabic = continuing
      ? continues ? "middle" : "end"
      : continues ? "begin" : "single";
    syllables.push({ text: continues ? token.slice(0, -1) : token, syllabic });
    continuing = continues;
  }
  return syllables;
};

/**
 * Single pitched notes of a part in document order. Chord notes (the chord's
 * first note as well as its <chord/> followers) are excluded.
 */
export const listLyricTargetNotes = (part: Element): Element[] => {
  const targets: Element[] = [];
  for (const measure of listMeasures(part)) {
    const notes = getDirectChildren(measure, "note");
    notes.forEach((note, index) => {
      if (isRestOrUnpitched(note) || !readPitch(note)) return;
      if (isChordFollower(note)) return;
      const next = notes[index + 1];
      if (next && isChordFollower(next)) return;
      targets.push(note);
    });
  }
  return targets;
};

export const applyLyrics = (
  doc: XMLDocument,
  text: string,
  options: LyricsOptions = {}
): LyricsResult => {
  const partIndex = options.partIndex ?? 0;
  const part = listParts(doc)[partIndex];
  if (!part) return { assigned: 0, warnings: [] };

  const syllables = splitSyllables(text);
  const notes = listLyricTargetNotes(part);
  const assigned = Math.min(syllables.length, notes.length);
  for (let i = 0; i < assigned; i += 1) {
    writeLyric(notes[i], syllables[i]);
  }

  const warnings: LyricsResult["warnings"] = [];
  if (syllables.length > notes.length) {
    warnings.push({
      code: "LYRICS_EXCEED_NOTES",
      message: `${syllables.length - notes.length} of ${syllables.length} syllables had no note to attach to.`,
    });
  }
  return { assigned, warnings };
};

const writeLyric = (note: Element, syllable: Syllable): void => {
  for (const existing of getDirectChildren(note, "lyric")) {
    const number = existing.getAttribute("number");
    if (number === null || number === "1") existing.remove();
  }
  const doc = note.ownerDocument;
  const lyric = doc.createElement("lyric");
  lyric.setAttribute("number", "1");
  const syllabic = doc.createElement("syllabic");
  syllabic.textContent = syllable.syllabic;
  const text = doc.createElement("text");
  text.textContent = syllable.text;
  lyric.appendChild(syllabic);
  lyric.appendChild(text);
  insertLyric(note, lyric);
};
