import { z } from "zod";
import { CommonErrors } from "./errors.ts";

export const semicolonPreferences = ["ignore", "insert", "remove"] as const;

export const formatCodeOptionsSchema = z.object({
  indentSize: z
    .number()
    .int()
    .min(0)
    .default(4)
    .describe("Number of spaces per indentation level"),
  convertTabsToSpaces: z
    .boolean()
    .default(true)
    .describe("Use spaces instead of tabs"),
  organizeImports: z
    .boolean()
    .default(true)
    .describe("Sort and combine import declarations"),
  semicolons: z
    .enum(semicolonPreferences)
    .default("ignore")
    .describe("Whether to insert or remove statement semicolons"),
});

export type FormatCodeOptions = z.input<typeof formatCodeOptionsSchema>;
export type ResolvedFormatCodeOptions = z.output<typeof formatCodeOptionsSchema>;

export const printableCredOptionsSchema = z.object({
  visible: z
    .number()
    .int()
    .default(1)
    .describe("Characters left unmasked at each end (at least 1)"),
  maskChar: z.string().default("*").describe("Mask character"),
  maskCharCount: z
    .number()
    .int()
    .min(0)
    .default(4)
    .describe("How many mask characters to insert"),
});

export type PrintableCredOptions = z.input<typeof printableCredOptionsSchema>;

/**
 * Parse options against a schema, throwing INVALID_OPTIONS on failure
 */
export function parseOptions<S extends z.ZodTypeAny>(
  schema: S,
  options: unknown
): z.output<S> {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    throw CommonErrors.INVALID_OPTIONS(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}
