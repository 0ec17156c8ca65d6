export type NestedList<T> = (T | NestedList<T>)[];

/**
 * Flattens arrays nested to any depth, keeping item order
 */
export function flattenList<T>(list: NestedList<T>): T[] {
  const flat: T[] = [];
  for (const item of list) {
    if (Array.isArray(item)) {
      flat.push(...flattenList<T>(item));
    } else {
      flat.push(item);
    }
  }
  return flat;
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;

  describe("flattenList", () => {
    it("should flatten nested lists of any depth", () => {
      expect(flattenList<number>([1, [2, [3, [4]]], 5])).toEqual([1, 2, 3, 4, 5]);
    });

    it("should keep a flat list as is", () => {
      expect(flattenList(["a", "b"])).toEqual(["a", "b"]);
    });

    it("should drop empty nested lists", () => {
      expect(flattenList<number>([[], [1, []], []])).toEqual([1]);
    });

    it("should handle empty list", () => {
      expect(flattenList([])).toEqual([]);
    });
  });
}
