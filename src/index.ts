export { locateCodeLine, tryLocateCodeLine } from "./ts/locateCodeLine.ts";
export { locateLineNumber } from "./textUtils/locateLineNumber.ts";
export {
  scanForNeedle,
  initialScanGate,
  type ScanGate,
  type ScanOptions,
} from "./textUtils/scanGate.ts";
export { createLineMatcher, type LineMatcher } from "./textUtils/createLineMatcher.ts";
export {
  normalizeSource,
  parseSource,
  type NormalizeSourceOptions,
} from "./ts/normalizeSource.ts";
export { formatCode } from "./ts/formatCode.ts";

export { flattenList, type NestedList } from "./utils/flattenList.ts";
export { isCidr, isIp } from "./utils/ipAddress.ts";
export { printableCred } from "./utils/printableCred.ts";
export { removeNone } from "./utils/removeNone.ts";
export { standardizeAsn } from "./utils/standardizeAsn.ts";

export {
  CodeUtilsError,
  SourceParseError,
  CommonErrors,
  type ParseDiagnostic,
} from "./common/errors.ts";
export {
  formatError,
  type UtilError,
  type UtilResult,
} from "./common/errorHandling.ts";
export type { FormatCodeOptions, PrintableCredOptions } from "./common/schemas.ts";
export { debug, isDebugEnabled } from "./common/debug.ts";
