import { type FormatCodeSettings, type SourceFile, ts } from "ts-morph";
import { debug } from "../common/debug.ts";
import { CodeUtilsError, CommonErrors } from "../common/errors.ts";
import { utilErr, utilOk, type UtilResult } from "../common/errorHandling.ts";
import {
  formatCodeOptionsSchema,
  parseOptions,
  type FormatCodeOptions,
  type ResolvedFormatCodeOptions,
} from "../common/schemas.ts";
import { parseSource } from "./normalizeSource.ts";

const semicolonPreference: Record<
  ResolvedFormatCodeOptions["semicolons"],
  ts.SemicolonPreference
> = {
  ignore: ts.SemicolonPreference.Ignore,
  insert: ts.SemicolonPreference.Insert,
  remove: ts.SemicolonPreference.Remove,
};

function toFormatSettings(options: ResolvedFormatCodeOptions): FormatCodeSettings {
  return {
    indentSize: options.indentSize,
    tabSize: options.indentSize,
    convertTabsToSpaces: options.convertTabsToSpaces,
    semicolons: semicolonPreference[options.semicolons],
  };
}

// Sorts and merges imports; unused imports are kept
function sortImports(sourceFile: SourceFile, settings: FormatCodeSettings): void {
  const fileName = sourceFile.getFilePath();
  const fileChanges = sourceFile
    .getProject()
    .getLanguageService()
    .compilerObject.organizeImports(
      { type: "file", fileName, mode: ts.OrganizeImportsMode.SortAndCombine },
      settings,
      {}
    );
  for (const change of fileChanges) {
    if (change.fileName === fileName) {
      sourceFile.applyTextChanges(change.textChanges);
    }
  }
}

function failure(error: CodeUtilsError): UtilResult<never> {
  debug(error.format());
  return utilErr(error.message, error);
}

/**
 * Formats code and sorts its imports.
 * Code without anything to change comes back as it was.
 * @param code Source code to format
 * @param options Formatter settings
 * @returns Formatted code, or an error result for invalid code or options
 */
export function formatCode(
  code: string,
  options: FormatCodeOptions = {}
): UtilResult<string> {
  let resolved: ResolvedFormatCodeOptions;
  try {
    resolved = parseOptions(formatCodeOptionsSchema, options);
  } catch (error) {
    if (error instanceof CodeUtilsError) {
      return failure(error);
    }
    throw error;
  }

  const { sourceFile, diagnostics } = parseSource(code, { fileName: "format.ts" });
  if (diagnostics.length > 0) {
    const first = diagnostics[0];
    return failure(
      CommonErrors.FORMAT_FAILED(`${first.line}:${first.column} ${first.message}`)
    );
  }

  const settings = toFormatSettings(resolved);
  try {
    sourceFile.formatText(settings);
    if (resolved.organizeImports) {
      sortImports(sourceFile, settings);
    }
  } catch (error) {
    return failure(
      CommonErrors.FORMAT_FAILED(
        error instanceof Error ? error.message : String(error)
      )
    );
  }

  return utilOk(sourceFile.getFullText());
}
