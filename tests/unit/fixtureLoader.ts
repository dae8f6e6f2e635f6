import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ScoreFragment } from "../../core/interfaces";
import { parseXml } from "../../core/xmlUtils";

export const fixturePath = (name: string): string =>
  resolve(process.cwd(), "tests", "fixtures", name);

export const loadFixture = (name: string): string => readFileSync(fixturePath(name), "utf-8");

export const loadFixtureDoc = (name: string): XMLDocument => parseXml(loadFixture(name), name);

export const loadFragment = (name: string): ScoreFragment => ({
  source: name,
  xml: loadFixture(name),
});
