import { createLineMatcher, type LineMatcher } from "./createLineMatcher.ts";

/**
 * Whether the needle may currently be matched.
 * "disarmed" only looks for the start trigger.
 */
export type ScanGate = "disarmed" | "armed";

export interface ScanOptions {
  /** Arms the gate on the line after the one it matches */
  triggerStart?: RegExp;
  /** Ends the scan without a result when it matches while armed */
  triggerStop?: RegExp;
  /** Lines for which this returns true take no part in matching */
  skipLine: (line: string) => boolean;
}

type ScanStep = "next" | "arm" | "found" | "stop";

interface ScanMatchers {
  needle: LineMatcher;
  triggerStart?: LineMatcher;
  triggerStop?: LineMatcher;
}

export function initialScanGate(triggerStart: RegExp | undefined): ScanGate {
  return triggerStart === undefined ? "armed" : "disarmed";
}

function nextStep(gate: ScanGate, line: string, matchers: ScanMatchers): ScanStep {
  // The start trigger line is consumed whatever the gate state
  if (matchers.triggerStart?.(line)) {
    return "arm";
  }

  switch (gate) {
    case "disarmed":
      return "next";
    case "armed":
      if (matchers.needle(line)) {
        return "found";
      }
      if (matchers.triggerStop?.(line)) {
        return "stop";
      }
      return "next";
  }
}

/**
 * Finds the first line matching the needle inside the trigger window
 * @param lines Lines to scan, in order
 * @param needle Pattern tested at the start of each eligible line
 * @param options Triggers and skip predicate
 * @returns 0-based index of the matching line, or undefined
 */
export function scanForNeedle(
  lines: readonly string[],
  needle: RegExp,
  options: ScanOptions
): number | undefined {
  const matchers: ScanMatchers = {
    needle: createLineMatcher(needle),
    triggerStart: options.triggerStart && createLineMatcher(options.triggerStart),
    triggerStop: options.triggerStop && createLineMatcher(options.triggerStop),
  };
  let gate = initialScanGate(options.triggerStart);

  for (let lineIndex = 0; lineIndex < lines.length; lineIndex++) {
    const line = lines[lineIndex];
    if (options.skipLine(line)) {
      continue;
    }

    switch (nextStep(gate, line, matchers)) {
      case "arm":
        gate = "armed";
        break;
      case "found":
        return lineIndex;
      case "stop":
        return undefined;
      case "next":
        break;
    }
  }

  return undefined;
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;
  const never = () => false;

  describe("initialScanGate", () => {
    it("should start armed without a start trigger", () => {
      expect(initialScanGate(undefined)).toBe("armed");
    });

    it("should start disarmed with a start trigger", () => {
      expect(initialScanGate(/x/)).toBe("disarmed");
    });
  });

  describe("scanForNeedle", () => {
    it("should find needle on the first line when armed", () => {
      expect(scanForNeedle(["foo", "bar"], /foo/, { skipLine: never })).toBe(0);
    });

    it("should return undefined when nothing matches", () => {
      expect(scanForNeedle(["foo", "bar"], /baz/, { skipLine: never })).toBeUndefined();
    });

    it("should not test the start trigger line against the needle", () => {
      const lines = ["start here", "other"];
      expect(
        scanForNeedle(lines, /start/, { triggerStart: /start/, skipLine: never })
      ).toBeUndefined();
    });

    it("should ignore the stop trigger while disarmed", () => {
      const lines = ["stop", "start", "needle"];
      expect(
        scanForNeedle(lines, /needle/, {
          triggerStart: /start/,
          triggerStop: /stop/,
          skipLine: never,
        })
      ).toBe(2);
    });

    it("should stop at the stop trigger once armed", () => {
      const lines = ["start", "stop", "needle"];
      expect(
        scanForNeedle(lines, /needle/, {
          triggerStart: /start/,
          triggerStop: /stop/,
          skipLine: never,
        })
      ).toBeUndefined();
    });

    it("should prefer the needle when a line matches both needle and stop trigger", () => {
      const lines = ["start", "needle stop"];
      expect(
        scanForNeedle(lines, /needle/, {
          triggerStart: /start/,
          triggerStop: /needle/,
          skipLine: never,
        })
      ).toBe(1);
    });

    it("should not match skipped lines", () => {
      const lines = ["# foo", "foo"];
      expect(
        scanForNeedle(lines, /.*foo/, { skipLine: (line) => line.startsWith("#") })
      ).toBe(1);
    });

    it("should not arm on a skipped line", () => {
      const lines = ["# start", "needle"];
      expect(
        scanForNeedle(lines, /needle/, {
          triggerStart: /# start/,
          skipLine: (line) => line.startsWith("#"),
        })
      ).toBeUndefined();
    });
  });
}
