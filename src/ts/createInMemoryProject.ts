import { Project, ts } from "ts-morph";

/**
 * Create a throwaway project holding a single snippet of source
 */
export function createInMemoryProject(): Project {
  return new Project({
    useInMemoryFileSystem: true,
    skipFileDependencyResolution: true,
    compilerOptions: {
      target: ts.ScriptTarget.ESNext,
      module: ts.ModuleKind.ESNext,
      allowJs: true,
      jsx: ts.JsxEmit.Preserve,
      noLib: true,
    },
  });
}
