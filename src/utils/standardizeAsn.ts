/**
 * Normalizes an autonomous system number to the "ASN<digits>" form.
 * Values with no digits, or more than one run of digits, are returned as is.
 */
export function standardizeAsn(asn: string): string {
  const numbers = asn.match(/[0-9]+/g) ?? [];
  if (numbers.length === 1) {
    return `ASN${numbers[0]}`;
  }
  return asn;
}

if (import.meta.vitest) {
  const { describe, it, expect } = import.meta.vitest;

  describe("standardizeAsn", () => {
    it("should prefix a bare number", () => {
      expect(standardizeAsn("13335")).toBe("ASN13335");
    });

    it("should normalize other prefixes", () => {
      expect(standardizeAsn("AS 13335")).toBe("ASN13335");
      expect(standardizeAsn("as13335")).toBe("ASN13335");
      expect(standardizeAsn("ASN13335")).toBe("ASN13335");
    });

    it("should leave values without exactly one number unchanged", () => {
      expect(standardizeAsn("unknown")).toBe("unknown");
      expect(standardizeAsn("AS1-AS2")).toBe("AS1-AS2");
    });
  });
}
