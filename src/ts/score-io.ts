import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { dirname, extname, join } from "node:path";
import { ParseError } from "../../core/errors";
import type { ScoreFragment } from "../../core/interfaces";
import { sortFragmentSources } from "../../core/ScoreCombiner";
import { parseXml, serializeXml } from "../../core/xmlUtils";

const FRAGMENT_EXTENSIONS = new Set([".musicxml", ".xml"]);

export const isFragmentPath = (path: string): boolean =>
  FRAGMENT_EXTENSIONS.has(extname(path).toLowerCase());

const readText = async (path: string): Promise<string> => {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    throw new ParseError(path, "file could not be read.", { cause: error });
  }
};

export const readScoreFragment = async (path: string): Promise<ScoreFragment> => ({
  source: path,
  xml: await readText(path),
});

export const readScoreFile = async (path: string): Promise<XMLDocument> =>
  parseXml(await readText(path), path);

export const writeScoreFile = async (path: string, doc: XMLDocument): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeXml(doc), "utf-8");
};

const walkFragments = async (dir: string): Promise<string[]> => {
  const found: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      found.push(...(await walkFragments(path)));
    } else if (entry.isFile() && isFragmentPath(entry.name)) {
      found.push(path);
    }
  }
  return found;
};

/**
 * Expands directories to the MusicXML files beneath them and orders the
 * result by page.
 */
export const collectFragmentPaths = async (inputs: readonly string[]): Promise<string[]> => {
  const paths: string[] = [];
  for (const input of inputs) {
    const info = await stat(input);
    if (info.isDirectory()) {
      paths.push(...(await walkFragments(input)));
    } else {
      paths.push(input);
    }
  }
  return sortFragmentSources(paths);
};
