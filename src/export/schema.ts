import { z } from "zod";
import { TOOL_NAMES } from "../parsers/types.js";

export const NormalizedMessage = z.object({
  role: z.string(),
  content: z.string(),
  timestamp: z.string().datetime().nullable(), // ISO 8601
  extras: z.record(z.unknown()),
});

export const ExportDocument = z.object({
  source: z.enum(TOOL_NAMES),
  session_id: z.string().min(1),
  start_time: z.string().datetime().nullable(),
  last_updated: z.string().datetime().nullable(),
  cwd: z.string().nullable(),
  messages: z.array(NormalizedMessage),
});

export type NormalizedMessage = z.infer<typeof NormalizedMessage>;
export type ExportDocument = z.infer<typeof ExportDocument>;
