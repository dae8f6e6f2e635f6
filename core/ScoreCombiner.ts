import { EmptyInputError } from "./errors";
import type { CombineResult, ScoreFragment, Warning } from "./interfaces";
import { listMeasures, listParts, parseXml } from "./xmlUtils";

const fragmentOrder = new Intl.Collator("en", { numeric: true, sensitivity: "base" });

/**
 * Orders fragment sources by page, comparing digit runs numerically so that
 * page_2 sorts before page_10.
 */
export const sortFragmentSources = (sources: readonly string[]): string[] =>
  [...sources].sort((a, b) => fragmentOrder.compare(a, b));

/**
 * Concatenates per-page fragments into one score.
 *
 * The first fragment is the base: its parts fix the part count and order.
 * Measures of later fragments are appended to the base part at the same
 * index, with their numbers kept as given. Parts a later fragment has in
 * excess are dropped, and parts it lacks stay short; both are reported as
 * warnings.
 */
export const combineScoreFragments = (fragments: readonly ScoreFragment[]): CombineResult => {
  if (fragments.length === 0) {
    throw new EmptyInputError();
  }

  const [base, ...rest] = fragments;
  const doc = parseXml(base.xml, base.source);
  const baseParts = listParts(doc);
  const warnings: Warning[] = [];
  let measuresAppended = 0;

  for (const fragment of rest) {
    const fragmentParts = listParts(parseXml(fragment.xml, fragment.source));

    fragmentParts.forEach((part, partIndex) => {
      if (partIndex >= baseParts.length) return;
      const target = baseParts[partIndex];
      for (const measure of listMeasures(part)) {
        target.appendChild(doc.importNode(measure, true));
        measuresAppended += 1;
      }
    });

    if (fragmentParts.length > baseParts.length) {
      warnings.push({
        code: "FRAGMENT_EXTRA_PARTS_DROPPED",
        message: `${fragment.source} has ${fragmentParts.length} parts; parts beyond the first ${baseParts.length} were dropped.`,
      });
    } else if (fragmentParts.length < baseParts.length) {
      warnings.push({
        code: "FRAGMENT_MISSING_PARTS",
        message: `${fragment.source} has ${fragmentParts.length} of ${baseParts.length} parts; the remaining base parts received no measures from it.`,
      });
    }
  }

  return { doc, partCount: baseParts.length, measuresAppended, warnings };
};
