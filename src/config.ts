import { z } from "zod";
import { TOOL_NAMES } from "./parsers/types.js";
import type { ToolName } from "./parsers/types.js";
import { DATE_FIELDS, DEFAULT_DATE_PRIORITY } from "./search/types.js";
import { DEFAULT_CONTEXT_CHARS } from "./search/scanner.js";
import { InvalidConfigError } from "./errors.js";

const TOOL_ALIASES: Record<string, ToolName> = {
  gemini: "gemini-cli",
};

const ToolArg = z
  .string()
  .transform((name) => {
    const lower = name.trim().toLowerCase();
    return TOOL_ALIASES[lower] ?? lower;
  })
  .pipe(z.enum(TOOL_NAMES));

const DatePriority = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(","))
      .map((field) => field.trim())
      .filter(Boolean),
  )
  .pipe(
    z
      .array(z.enum(DATE_FIELDS))
      .nonempty("must name at least one of lastUpdated, startTime, fallback")
      .refine((fields) => new Set(fields).size === fields.length, "fields must not repeat"),
  );

/**
 * Run configuration as the CLI collects it. Option values arrive as
 * strings, so numbers are coerced here.
 */
export const SearchConfigSchema = z.object({
  query: z.string().min(1, "must not be empty"),
  tools: z
    .array(ToolArg)
    .nonempty()
    .default([...TOOL_NAMES])
    .transform((tools) => Array.from(new Set(tools))),
  maxResults: z.coerce.number().int().positive().optional(),
  contextChars: z.coerce.number().int().nonnegative().default(DEFAULT_CONTEXT_CHARS),
  datePriority: DatePriority.default([...DEFAULT_DATE_PRIORITY]),
  outputDir: z.string().min(1).optional(),
  roots: z
    .object({
      codex: z.string().min(1).optional(),
      "gemini-cli": z.string().min(1).optional(),
      opencode: z.string().min(1).optional(),
      cursor: z.string().min(1).optional(),
    })
    .default({}),
});

export type SearchConfigInput = z.input<typeof SearchConfigSchema>;
export type SearchConfig = z.output<typeof SearchConfigSchema>;

export function parseSearchConfig(input: unknown): SearchConfig {
  const result = SearchConfigSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new InvalidConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}
