import { scanForNeedle } from "../textUtils/scanGate.ts";
import { tryCatchSync, type UtilResult } from "../common/errorHandling.ts";
import { normalizeSource, type NormalizeSourceOptions } from "./normalizeSource.ts";

const QUOTE_CHARACTERS = new Set(["'", '"', "`"]);

// Bare string statements are printed with a leading quote
function isStringStatement(line: string): boolean {
  return QUOTE_CHARACTERS.has(line.trimStart().charAt(0));
}

/**
 * Finds the first line of normalized code matching the needle.
 *
 * The code is parsed and printed back (see normalizeSource) so that a needle
 * like /\s+greet\(/ matches a method regardless of the original formatting.
 * Pass a start trigger such as /class Greeter/ and a stop trigger such as
 * /class / to limit the search to one class body.
 *
 * @param needle Pattern tested at the start of each normalized line
 * @param code Source code to search
 * @param triggerStart Pattern that must be seen before the needle can match
 * @param triggerStop Pattern that ends the search once the start trigger was seen
 * @returns The matching line without surrounding whitespace, or undefined
 * @throws SourceParseError when the code has syntax errors
 */
export function locateCodeLine(
  needle: RegExp,
  code: string,
  triggerStart?: RegExp,
  triggerStop?: RegExp,
  options: NormalizeSourceOptions = {}
): string | undefined {
  const lines = normalizeSource(code, options).split("\n");
  const lineIndex = scanForNeedle(lines, needle, {
    triggerStart,
    triggerStop,
    skipLine: isStringStatement,
  });
  return lineIndex === undefined ? undefined : lines[lineIndex].trim();
}

/**
 * Same as locateCodeLine, with parse failures returned as an error result
 */
export function tryLocateCodeLine(
  needle: RegExp,
  code: string,
  triggerStart?: RegExp,
  triggerStop?: RegExp,
  options: NormalizeSourceOptions = {}
): UtilResult<string | undefined> {
  return tryCatchSync(
    () => locateCodeLine(needle, code, triggerStart, triggerStop, options),
    "Failed to locate line in code"
  );
}
