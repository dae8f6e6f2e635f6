import { JSDOM } from "jsdom";
import { expect } from "vitest";

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const { window } = new JSDOM("");

const parseXmlDocument = (xmlText: string): Document | null => {
  const doc = new window.DOMParser().parseFromString(xmlText, "application/xml");
  return doc.getElementsByTagName("parsererror").length > 0 ? null : doc;
};

/**
 * Compares two XML texts ignoring attribute order and whitespace-only text.
 */
export const expectXmlStructurallyEqual = (a: string, b: string): void => {
  const pa = parseXmlDocument(a);
  const pb = parseXmlDocument(b);
  expect(pa).not.toBeNull();
  expect(pb).not.toBeNull();
  if (!pa || !pb) return;
  expect(canonicalNode(pa.documentElement)).toBe(canonicalNode(pb.documentElement));
};

export const canonicalNode = (node: Node): string => {
  if (node.nodeType === TEXT_NODE) {
    const t = node.textContent?.trim() ?? "";
    return t ? `#text(${t})` : "";
  }
  if (node.nodeType !== ELEMENT_NODE || !isElement(node)) return "";

  const attrs = Array.from(node.attributes)
    .map((a) => `${a.name}=${a.value}`)
    .sort()
    .join(";");
  const children = Array.from(node.childNodes)
    .map(canonicalNode)
    .filter((x) => x.length > 0)
    .join(",");
  return `<${node.tagName}${attrs ? " " + attrs : ""}>${children}</${node.tagName}>`;
};

const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;
