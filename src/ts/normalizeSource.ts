import { type Diagnostic, type SourceFile, ts } from "ts-morph";
import { CommonErrors, type ParseDiagnostic } from "../common/errors.ts";
import { createInMemoryProject } from "./createInMemoryProject.ts";

export interface NormalizeSourceOptions {
  /** Decides the script kind, e.g. "snippet.tsx" for JSX */
  fileName?: string;
}

const printer = ts.createPrinter({
  newLine: ts.NewLineKind.LineFeed,
  removeComments: true,
});

// Synthesized literals print with one quote style and escaped newlines
function canonicalLiteral(
  node: ts.Node,
  factory: ts.NodeFactory
): ts.Node | undefined {
  if (ts.isStringLiteral(node)) {
    // JSX attribute values have no escapes, keep them as written
    return ts.isJsxAttribute(node.parent)
      ? undefined
      : factory.createStringLiteral(node.text);
  }
  if (ts.isNoSubstitutionTemplateLiteral(node)) {
    return factory.createNoSubstitutionTemplateLiteral(node.text);
  }
  if (ts.isTemplateHead(node)) {
    return factory.createTemplateHead(node.text);
  }
  if (ts.isTemplateMiddle(node)) {
    return factory.createTemplateMiddle(node.text);
  }
  if (ts.isTemplateTail(node)) {
    return factory.createTemplateTail(node.text);
  }
  return undefined;
}

const canonicalize: ts.TransformerFactory<ts.SourceFile> = (context) => {
  const { factory } = context;
  const visit = (node: ts.Node): ts.Node => {
    const literal = canonicalLiteral(node, factory);
    if (literal) {
      return literal;
    }

    const visited = ts.visitEachChild(node, visit, context);
    if (ts.isObjectLiteralExpression(visited)) {
      return factory.createObjectLiteralExpression(
        factory.createNodeArray(visited.properties, false),
        false
      );
    }
    if (ts.isArrayLiteralExpression(visited)) {
      return factory.createArrayLiteralExpression(
        factory.createNodeArray(visited.elements, false),
        false
      );
    }
    return visited;
  };
  return (sourceFile) => ts.visitEachChild(sourceFile, visit, context);
};

function toParseDiagnostic(
  sourceFile: SourceFile,
  diagnostic: Diagnostic
): ParseDiagnostic {
  const messageText = diagnostic.getMessageText();
  const message =
    typeof messageText === "string" ? messageText : messageText.getMessageText();
  const start = diagnostic.getStart();
  if (start === undefined) {
    return { line: 1, column: 1, message };
  }
  const { line, column } = sourceFile.getLineAndColumnAtPos(start);
  return { line, column, message };
}

/**
 * Parses source and returns the syntax errors found, if any
 */
export function parseSource(
  code: string,
  options: NormalizeSourceOptions = {}
): { sourceFile: SourceFile; diagnostics: ParseDiagnostic[] } {
  const project = createInMemoryProject();
  const sourceFile = project.createSourceFile(
    options.fileName ?? "normalized.ts",
    code,
    { overwrite: true }
  );
  const diagnostics = project
    .getProgram()
    .getSyntacticDiagnostics(sourceFile)
    .map((diagnostic) => toParseDiagnostic(sourceFile, diagnostic));
  return { sourceFile, diagnostics };
}

/**
 * Parses source and prints it back in canonical form.
 *
 * Every statement gets a single predictable shape: one statement per line,
 * 4-space indentation, comments dropped, strings in double quotes, template
 * literals on one line and object and array literals on one line. A bare
 * string statement (such as a "use strict" directive) starts with its quote
 * character.
 *
 * @throws SourceParseError when the code has syntax errors
 */
export function normalizeSource(
  code: string,
  options: NormalizeSourceOptions = {}
): string {
  const { sourceFile, diagnostics } = parseSource(code, options);
  if (diagnostics.length > 0) {
    throw CommonErrors.PARSE_FAILED(diagnostics);
  }
  const result = ts.transform(sourceFile.compilerNode, [canonicalize]);
  try {
    return printer.printFile(result.transformed[0]);
  } finally {
    result.dispose();
  }
}
