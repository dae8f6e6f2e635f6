import { accidentalTextFromAlter, resolveAccidentalTextForPitch } from "./accidentalSpelling";
import type {
  Interval,
  Pitch,
  PartTransposeReport,
  TransposeOptions,
  TransposeResult,
  Warning,
} from "./interfaces";
import { isUnison, resolveInterval } from "./interval";
import { shiftKey, transposePitch, type KeyShift } from "./transpose";
import {
  getDirectChild,
  getDirectChildren,
  getStaffText,
  hasDirectChild,
  hasTieStop,
  isRestOrUnpitched,
  listMeasures,
  listParts,
  parseMeasureNumber,
  readPitch,
  readStepAlter,
  removeAccidental,
  setAccidental,
  writePitch,
  writeStepAlter,
} from "./xmlUtils";

const ALL_STAVES = "*";

// Attributes that mark an accidental the engraver chose to show.
const COURTESY_ACCIDENTAL_ATTRIBUTES = ["cautionary", "editorial", "parentheses"];

// Children of <attributes> that precede <key>.
const ATTRIBUTES_BEFORE_KEY = ["footnote", "level", "divisions"];

/**
 * Key in effect per staff. A <key> without a number attribute applies to
 * every staff and clears staff-specific entries.
 */
class KeyContext {
  private readonly byStaff = new Map<string, number>();

  public get(staff: string): number {
    return this.byStaff.get(staff) ?? this.byStaff.get(ALL_STAVES) ?? 0;
  }

  public has(staff: string): boolean {
    return this.byStaff.has(staff) || this.byStaff.has(ALL_STAVES);
  }

  public set(staff: string, fifths: number): void {
    if (staff === ALL_STAVES) this.byStaff.clear();
    this.byStaff.set(staff, fifths);
  }
}

type PartPass = {
  interval: Interval;
  options: TransposeOptions;
  report: PartTransposeReport;
  warnings: Warning[];
  sourceKeys: KeyContext;
  writtenKeys: KeyContext;
};

/**
 * Shifts every measure whose number is at least `fromMeasure`, in every
 * part, by the interval. The comparison uses the stored measure number, so
 * with non-monotonic numbering the shifted region need not be contiguous.
 * Measures below the threshold are left untouched; a threshold past the end
 * of the piece shifts nothing and is not an error.
 */
export const transposeSection = (doc: XMLDocument, options: TransposeOptions): TransposeResult => {
  const interval = resolveInterval(options.interval);
  const warnings: Warning[] = [];
  const partReports = listParts(doc).map((part, partIndex) =>
    transposePart(part, partIndex, interval, options, warnings)
  );
  const transposedMeasureCount = partReports.reduce(
    (sum, report) => sum + report.transposedMeasureCount,
    0
  );
  return { interval, transposedMeasureCount, partReports, warnings };
};

/**
 * Lowest measure number whose key signature has at least `minFifths` sharps.
 */
export const findKeyChangeMeasure = (
  doc: XMLDocument,
  options: { minFifths?: number } = {}
): number | null => {
  const minFifths = options.minFifths ?? 5;
  let found: number | null = null;
  for (const part of listParts(doc)) {
    for (const measure of listMeasures(part)) {
      const number = parseMeasureNumber(measure);
      if (number === null) continue;
      const hasSharpKey = listKeyElements(measure).some((key) => {
        const fifths = readKeyFifths(key);
        return fifths !== null && fifths >= minFifths;
      });
      if (hasSharpKey && (found === null || number < found)) found = number;
    }
  }
  return found;
};

const transposePart = (
  part: Element,
  partIndex: number,
  interval: Interval,
  options: TransposeOptions,
  warnings: Warning[]
): PartTransposeReport => {
  const pass: PartPass = {
    interval,
    options,
    warnings,
    report: {
      partIndex,
      partId: part.getAttribute("id") ?? "",
      transposedMeasureCount: 0,
      keySignaturesRewritten: 0,
      keySignaturesInserted: 0,
      keySignaturesRemoved: 0,
      notesTransposed: 0,
    },
    sourceKeys: new KeyContext(),
    writtenKeys: new KeyContext(),
  };

  let previousInRegion = false;
  for (const measure of listMeasures(part)) {
    const number = parseMeasureNumber(measure);
    const inRegion = number !== null && number >= options.fromMeasure;
    if (!inRegion) {
      for (const key of listKeyElements(measure)) {
        const fifths = readKeyFifths(key);
        if (fifths === null) continue;
        pass.sourceKeys.set(keyStaff(key), fifths);
        pass.writtenKeys.set(keyStaff(key), fifths);
      }
      previousInRegion = false;
      continue;
    }

    if (!previousInRegion) ensureKeyAtRegionStart(measure, pass);
    transposeMeasure(measure, pass, !previousInRegion);
    pass.report.transposedMeasureCount += 1;
    previousInRegion = true;
  }
  return pass.report;
};

const transposeMeasure = (measure: Element, pass: PartPass, regionStart: boolean): void => {
  const previousAlterByPitchKey = new Map<string, number>();
  let leading = regionStart;
  for (const child of Array.from(measure.children)) {
    if (child.tagName === "attributes") {
      for (const key of getDirectChildren(child, "key")) rewriteKey(key, measure, pass, leading);
    } else if (child.tagName === "note") {
      leading = false;
      transposeNote(child, pass, previousAlterByPitchKey);
    } else if (child.tagName === "harmony") {
      transposeHarmony(child, pass);
    }
  }
};

const shiftForStaff = (staff: string, pass: PartPass): KeyShift =>
  shiftKey(pass.sourceKeys.get(staff), pass.interval, pass.options.keyFifths);

/**
 * Rewrites a key signature for the shifted region. A key change that opens
 * the region and, once shifted, repeats the key written before it is
 * removed instead.
 */
const rewriteKey = (key: Element, measure: Element, pass: PartPass, leading: boolean): void => {
  const fifthsNode = getDirectChild(key, "fifths");
  const fifths = readKeyFifths(key);
  if (!fifthsNode || fifths === null) {
    if (hasDirectChild(key, "key-step")) {
      pass.warnings.push({
        code: "NON_TRADITIONAL_KEY_SKIPPED",
        message: `Part ${pass.report.partId || pass.report.partIndex + 1}, measure ${measure.getAttribute("number") ?? "?"}: non-traditional key signature left unchanged.`,
      });
    }
    return;
  }
  const staff = keyStaff(key);
  const written = pass.writtenKeys.has(staff) ? pass.writtenKeys.get(staff) : null;
  pass.sourceKeys.set(staff, fifths);
  const shifted = shiftForStaff(staff, pass);
  if (leading && written !== null && fifths !== written && shifted.fifths === written) {
    const attributes = key.parentElement;
    key.remove();
    if (attributes && attributes.children.length === 0) attributes.remove();
    pass.report.keySignaturesRemoved += 1;
    return;
  }
  if (shifted.fifths !== fifths) fifthsNode.textContent = String(shifted.fifths);
  pass.writtenKeys.set(staff, shifted.fifths);
  pass.report.keySignaturesRewritten += 1;
};

/**
 * When the region starts in a measure without its own key signature, the
 * key written earlier would no longer match the shifted notes, so a key is
 * declared at the start of that measure. It is created with the source key
 * and rewritten with the others when the measure is walked.
 */
const ensureKeyAtRegionStart = (measure: Element, pass: PartPass): void => {
  if (leadingKeyDeclared(measure)) return;
  const staff = "1";
  const shifted = shiftForStaff(staff, pass);
  if (shifted.fifths === pass.writtenKeys.get(staff)) return;

  const doc = measure.ownerDocument;
  const key = doc.createElement("key");
  const fifths = doc.createElement("fifths");
  fifths.textContent = String(pass.sourceKeys.get(staff));
  key.appendChild(fifths);

  const leading = Array.from(measure.children).find(
    (child) => child.tagName === "attributes" || child.tagName === "note"
  );
  let attributes = leading?.tagName === "attributes" ? leading : null;
  if (!attributes) {
    attributes = doc.createElement("attributes");
    const anchor = Array.from(measure.children).find((child) => child.tagName !== "print");
    measure.insertBefore(attributes, anchor ?? null);
  }
  const keyAnchor = Array.from(attributes.children).find(
    (child) => !ATTRIBUTES_BEFORE_KEY.includes(child.tagName)
  );
  attributes.insertBefore(key, keyAnchor ?? null);
  pass.report.keySignaturesInserted += 1;
};

const leadingKeyDeclared = (measure: Element): boolean => {
  for (const child of Array.from(measure.children)) {
    if (child.tagName === "note") return false;
    if (child.tagName === "attributes" && hasDirectChild(child, "key")) return true;
  }
  return false;
};

const transposeNote = (
  note: Element,
  pass: PartPass,
  previousAlterByPitchKey: Map<string, number>
): void => {
  if (isRestOrUnpitched(note)) return;
  const pitch = readPitch(note);
  if (!pitch) return;

  const staff = getStaffText(note);
  const shift = shiftForStaff(staff, pass);
  const next = transposePitch(pitch, pass.interval, shift.enharmonicAdjust);
  if (!samePitch(pitch, next)) writePitch(note, next);
  pass.report.notesTransposed += 1;

  if (isUnison(pass.interval) && shift.fifths === pass.sourceKeys.get(staff)) return;
  if (!Number.isInteger(next.alter)) return;
  const accidentalText = resolveAccidentalTextForPitch(next, {
    keyFifths: shift.fifths,
    previousAlterByPitchKey,
    pitchKey: `${staff}:${next.octave}:${next.step}`,
  });
  const existing = getDirectChild(note, "accidental");
  if (existing && isCourtesyAccidental(existing)) {
    existing.textContent = accidentalTextFromAlter(next.alter) ?? existing.textContent;
    return;
  }
  if (accidentalText && !hasTieStop(note)) {
    setAccidental(note, accidentalText);
  } else {
    removeAccidental(note);
  }
};

const transposeHarmony = (harmony: Element, pass: PartPass): void => {
  const shift = shiftForStaff(getStaffText(harmony), pass);
  const targets: Array<[string, string, string]> = [
    ["root", "root-step", "root-alter"],
    ["bass", "bass-step", "bass-alter"],
  ];
  for (const [container, stepTag, alterTag] of targets) {
    const node = getDirectChild(harmony, container);
    if (!node) continue;
    const pitch = readStepAlter(node, stepTag, alterTag);
    if (!pitch) continue;
    const next = transposePitch(pitch, pass.interval, shift.enharmonicAdjust);
    if (!samePitch(pitch, next)) writeStepAlter(node, next, stepTag, alterTag);
  }
};

const samePitch = (a: Pitch, b: Pitch): boolean =>
  a.step === b.step && a.alter === b.alter && a.octave === b.octave;

const isCourtesyAccidental = (accidental: Element): boolean =>
  COURTESY_ACCIDENTAL_ATTRIBUTES.some((name) => accidental.getAttribute(name) === "yes");

const listKeyElements = (measure: Element): Element[] =>
  getDirectChildren(measure, "attributes").flatMap((attributes) =>
    getDirectChildren(attributes, "key")
  );

const readKeyFifths = (key: Element): number | null => {
  const text = getDirectChild(key, "fifths")?.textContent?.trim() ?? "";
  if (!text) return null;
  const fifths = Number(text);
  return Number.isInteger(fifths) ? fifths : null;
};

const keyStaff = (key: Element): string => key.getAttribute("number")?.trim() || ALL_STAVES;
