import { JSDOM } from "jsdom";
import { ParseError } from "./errors";
import type { Pitch, Step } from "./interfaces";

const SCORE_PARTWISE = "score-partwise";
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const STEPS: readonly Step[] = ["C", "D", "E", "F", "G", "A", "B"];

// Elements that must follow <accidental> inside <note>.
const NOTE_CHILDREN_AFTER_ACCIDENTAL = [
  "time-modification",
  "stem",
  "notehead",
  "notehead-text",
  "staff",
  "beam",
  "notations",
  "lyric",
  "play",
  "listen",
];

const NOTE_CHILDREN_AFTER_LYRIC = ["lyric", "play", "listen"];

const { window } = new JSDOM("");

export const parseXml = (xmlText: string, source = "MusicXML input"): XMLDocument => {
  let doc: XMLDocument;
  try {
    doc = new window.DOMParser().parseFromString(xmlText.replace(/^\uFEFF/, ""), "application/xml");
  } catch (error) {
    throw new ParseError(source, "Invalid XML input.", { cause: error });
  }
  if (doc.getElementsByTagName("parsererror").length > 0) {
    throw new ParseError(source, "Invalid XML input.");
  }
  const root = doc.documentElement;
  if (!root || root.tagName !== SCORE_PARTWISE) {
    throw new ParseError(source, "MusicXML root must be <score-partwise>.");
  }
  return doc;
};

export const serializeXml = (doc: XMLDocument): string => {
  const text = new window.XMLSerializer().serializeToString(doc);
  return text.startsWith("<?xml") ? text : `${XML_DECLARATION}\n${text}`;
};

export const serializeNode = (node: Node): string =>
  new window.XMLSerializer().serializeToString(node);

export const listParts = (doc: XMLDocument): Element[] =>
  getDirectChildren(doc.documentElement, "part");

export const listMeasures = (part: Element): Element[] => getDirectChildren(part, "measure");

/**
 * Leading integer of the measure's number attribute ("12a" -> 12), or null.
 */
export const parseMeasureNumber = (measure: Element): number | null => {
  const raw = measure.getAttribute("number") ?? "";
  const match = /^\s*(-?\d+)/.exec(raw);
  return match ? Number(match[1]) : null;
};

export const isStep = (value: string): value is Step =>
  (STEPS as readonly string[]).includes(value);

export const readPitch = (note: Element): Pitch | null => {
  const pitchNode = getDirectChild(note, "pitch");
  if (!pitchNode) return null;
  return readPitchParts(pitchNode, "step", "alter", "octave");
};

export const writePitch = (note: Element, pitch: Pitch): void => {
  const pitchNode = getDirectChild(note, "pitch");
  if (!pitchNode) return;
  writePitchParts(pitchNode, pitch, "step", "alter", "octave");
};

/**
 * Reads a step/alter pair such as <root-step>/<root-alter>. Octave is unused.
 */
export const readStepAlter = (
  parent: Element,
  stepTag: string,
  alterTag: string
): Pitch | null => {
  const stepText = getDirectChild(parent, stepTag)?.textContent?.trim() ?? "";
  if (!isStep(stepText)) return null;
  const alter = Number(getDirectChild(parent, alterTag)?.textContent?.trim() ?? "0");
  return { step: stepText, alter: Number.isFinite(alter) ? alter : 0, octave: 4 };
};

export const writeStepAlter = (
  parent: Element,
  pitch: Pitch,
  stepTag: string,
  alterTag: string
): void => {
  writePitchParts(parent, pitch, stepTag, alterTag, null);
};

export const isRestOrUnpitched = (note: Element): boolean =>
  hasDirectChild(note, "rest") || hasDirectChild(note, "unpitched");

export const isChordFollower = (note: Element): boolean => hasDirectChild(note, "chord");

export const getStaffText = (element: Element): string =>
  getDirectChild(element, "staff")?.textContent?.trim() || "1";

export const setAccidental = (note: Element, accidentalText: string): void => {
  const existing = getDirectChild(note, "accidental");
  if (existing) {
    existing.textContent = accidentalText;
    return;
  }
  const accidental = note.ownerDocument.createElement("accidental");
  accidental.textContent = accidentalText;
  insertBeforeFirstOf(note, accidental, NOTE_CHILDREN_AFTER_ACCIDENTAL);
};

export const removeAccidental = (note: Element): void => {
  getDirectChild(note, "accidental")?.remove();
};

export const insertLyric = (note: Element, lyric: Element): void => {
  insertBeforeFirstOf(note, lyric, NOTE_CHILDREN_AFTER_LYRIC);
};

export const hasTieStop = (note: Element): boolean =>
  getDirectChildren(note, "tie").some((tie) => tie.getAttribute("type") === "stop");

export const upsertSimpleChild = (
  parent: Element,
  tagName: string,
  value: string
): Element => {
  let node = getDirectChild(parent, tagName);
  if (!node) {
    node = parent.ownerDocument.createElement(tagName);
    parent.appendChild(node);
  }
  node.textContent = value;
  return node;
};

export const hasDirectChild = (parent: Element, tagName: string): boolean =>
  Array.from(parent.children).some((child) => child.tagName === tagName);

export const getDirectChild = (parent: Element, tagName: string): Element | null =>
  Array.from(parent.children).find((child) => child.tagName === tagName) ?? null;

export const getDirectChildren = (parent: Element, tagName: string): Element[] =>
  Array.from(parent.children).filter((child) => child.tagName === tagName);

const readPitchParts = (
  parent: Element,
  stepTag: string,
  alterTag: string,
  octaveTag: string
): Pitch | null => {
  const stepText = getDirectChild(parent, stepTag)?.textContent?.trim() ?? "";
  const octave = Number(getDirectChild(parent, octaveTag)?.textContent?.trim() ?? "");
  if (!isStep(stepText) || !Number.isInteger(octave)) return null;
  const alter = Number(getDirectChild(parent, alterTag)?.textContent?.trim() ?? "0");
  return { step: stepText, alter: Number.isFinite(alter) ? alter : 0, octave };
};

const writePitchParts = (
  parent: Element,
  pitch: Pitch,
  stepTag: string,
  alterTag: string,
  octaveTag: string | null
): void => {
  const stepNode = upsertSimpleChild(parent, stepTag, pitch.step);
  const alterNode = getDirectChild(parent, alterTag);
  if (pitch.alter === 0) {
    alterNode?.remove();
  } else if (alterNode) {
    alterNode.textContent = String(pitch.alter);
  } else {
    const created = parent.ownerDocument.createElement(alterTag);
    created.textContent = String(pitch.alter);
    parent.insertBefore(created, stepNode.nextSibling);
  }
  if (octaveTag) upsertSimpleChild(parent, octaveTag, String(pitch.octave));
};

const insertBeforeFirstOf = (parent: Element, child: Element, followers: string[]): void => {
  const anchor = Array.from(parent.children).find((node) => followers.includes(node.tagName));
  parent.insertBefore(child, anchor ?? null);
};
