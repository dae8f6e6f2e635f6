export type Step = "A" | "B" | "C" | "D" | "E" | "F" | "G";

export type Pitch = {
  step: Step;
  alter: number;
  octave: number;
};

/**
 * A directed, spelled interval. `fifths` is the line-of-fifths displacement
 * (C -> G is +1, C -> B is +5), which keeps the spelling exact.
 */
export type Interval = {
  name: string;
  diatonicSteps: number;
  semitones: number;
  fifths: number;
};

export type ErrorCode =
  | "EMPTY_INPUT"
  | "PARSE_ERROR"
  | "INVALID_INTERVAL"
  | "INVALID_CONFIG"
  | "EXTERNAL_TOOL_FAILED"
  | "UNEXPECTED_ERROR";

export type WarningCode =
  | "FRAGMENT_EXTRA_PARTS_DROPPED"
  | "FRAGMENT_MISSING_PARTS"
  | "NON_TRADITIONAL_KEY_SKIPPED"
  | "LYRICS_EXCEED_NOTES";

export type Diagnostic = {
  code: ErrorCode;
  message: string;
};

export type Warning = {
  code: WarningCode;
  message: string;
};

export type ScoreFragment = {
  source: string;
  xml: string;
};

export type CombineResult = {
  doc: XMLDocument;
  partCount: number;
  measuresAppended: number;
  warnings: Warning[];
};

export type TransposeOptions = {
  fromMeasure: number;
  interval: string | Interval;
  /** Written key for the shifted region instead of the computed one. */
  keyFifths?: number;
};

export type PartTransposeReport = {
  partIndex: number;
  partId: string;
  transposedMeasureCount: number;
  keySignaturesRewritten: number;
  keySignaturesInserted: number;
  keySignaturesRemoved: number;
  notesTransposed: number;
};

export type TransposeResult = {
  interval: Interval;
  transposedMeasureCount: number;
  partReports: PartTransposeReport[];
  warnings: Warning[];
};

export type LyricsOptions = {
  partIndex?: number;
};

export type LyricsResult = {
  assigned: number;
  warnings: Warning[];
};
