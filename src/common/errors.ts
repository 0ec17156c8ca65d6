/**
 * Base error for the helpers, with a stable code and hints for the caller
 */
export class CodeUtilsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly suggestions: string[] = []
  ) {
    super(message);
    this.name = "CodeUtilsError";
  }

  /**
   * Format the error with its suggestions
   */
  format(): string {
    let result = `❌ Error: ${this.message}`;
    result += `\n   Code: ${this.code}`;

    if (this.suggestions.length > 0) {
      result += "\n\n💡 Suggestions:";
      this.suggestions.forEach((suggestion) => {
        result += `\n   • ${suggestion}`;
      });
    }

    return result;
  }
}

export interface ParseDiagnostic {
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  message: string;
}

/**
 * Raised when source text cannot be parsed
 */
export class SourceParseError extends CodeUtilsError {
  constructor(
    message: string,
    public readonly diagnostics: ParseDiagnostic[],
    suggestions: string[] = []
  ) {
    super(message, "PARSE_FAILED", suggestions);
    this.name = "SourceParseError";
  }
}

function describeDiagnostic(diagnostic: ParseDiagnostic): string {
  return `${diagnostic.line}:${diagnostic.column} ${diagnostic.message}`;
}

/**
 * Common error scenarios
 */
export const CommonErrors = {
  PARSE_FAILED: (diagnostics: ParseDiagnostic[]) =>
    new SourceParseError(
      diagnostics.length > 0
        ? `Failed to parse source: ${describeDiagnostic(diagnostics[0])}`
        : "Failed to parse source",
      diagnostics,
      [
        "Make sure the code is syntactically valid TypeScript or JavaScript",
        "Use a .tsx file name when the code contains JSX",
      ]
    ),

  FORMAT_FAILED: (reason: string) =>
    new CodeUtilsError(`Formatting of code failed: ${reason}`, "FORMAT_FAILED", [
      "Fix the syntax errors reported for the code and try again",
    ]),

  INVALID_OPTIONS: (issues: string[]) =>
    new CodeUtilsError(
      `Invalid options: ${issues.join("; ")}`,
      "INVALID_OPTIONS",
      ["Check the option names and value types"]
    ),
};
