import { scanForNeedle } from "./scanGate.ts";

function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

/**
 * Finds the line number of the first line matching the needle.
 * Works on raw text; blank lines are skipped but still counted.
 * @param needle Pattern tested at the start of each line
 * @param contents Text to search
 * @param triggerStart Pattern that must be seen before the needle can match
 * @param triggerStop Pattern that ends the search once the start trigger was seen
 * @returns Line number (1-based), or undefined when nothing matched
 */
export function locateLineNumber(
  needle: RegExp,
  contents: string,
  triggerStart?: RegExp,
  triggerStop?: RegExp
): number | undefined {
  const lineIndex = scanForNeedle(contents.split("\n"), needle, {
    triggerStart,
    triggerStop,
    skipLine: isBlankLine,
  });
  return lineIndex === undefined ? undefined : lineIndex + 1;
}
