// schemas/extract.schema.ts
import { z } from "zod";
import { isValidTimeZone } from "../lib/zonedTime";

export const ExtractBody = z.object({
  utterance: z.string().trim().min(1, "utterance is required").max(2000),
  /** IANA zone; the server default applies when omitted */
  timezone: z
    .string()
    .refine(isValidTimeZone, { message: "must be an IANA timezone name" })
    .optional(),
  /** Fixes "now" for deterministic requests, e.g. "2025-09-01T10:00:00-04:00" */
  referenceTime: z.string().datetime({ offset: true }).optional(),
});

export type ExtractBody = z.infer<typeof ExtractBody>;
