import { z } from "zod";
import { FeedError } from "./errors.js";
import { parseIsoDate } from "./scalars.js";
import type { FeedFormat } from "./types.js";

/**
 * Module: Validation Options
 * Purpose: Validate caller options once per run and resolve defaults, including the single
 * `now` reference every time-relative rule compares against.
 */
export const DEFAULT_MAX_DISCOVERY_DEPTH = 32;

const validateOptionsSchema = z
  .object({
    format: z.enum(["json", "xml"]).optional(),
    now: z
      .union([
        z.date().refine((d) => !Number.isNaN(d.getTime()), "now must be a valid date"),
        z.string().refine((s) => parseIsoDate(s) !== null, "now must be an ISO 8601 date or date-time"),
      ])
      .optional(),
    fields: z.array(z.string().min(1)).optional(),
    maxDiscoveryDepth: z.number().int().min(1).max(256).optional(),
    signal: z.instanceof(AbortSignal).optional(),
  })
  .strict();

export type ValidateOptions = z.input<typeof validateOptionsSchema>;

export interface ResolvedOptions {
  format?: FeedFormat;
  now: Date;
  fields?: readonly string[];
  maxDiscoveryDepth: number;
  signal?: AbortSignal;
}

export function resolveOptions(options: ValidateOptions = {}): ResolvedOptions {
  const parsed = validateOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "options"}: ${i.message}`);
    throw new FeedError("INVALID_OPTIONS", `Invalid validation options: ${issues.join("; ")}`, { issues });
  }
  const { format, now, fields, maxDiscoveryDepth, signal } = parsed.data;
  return {
    format,
    now: resolveNow(now),
    fields,
    maxDiscoveryDepth: maxDiscoveryDepth ?? DEFAULT_MAX_DISCOVERY_DEPTH,
    signal,
  };
}

const resolveNow = (now: Date | string | undefined): Date => {
  if (now instanceof Date) return new Date(now.getTime());
  if (typeof now === "string") {
    const parsed = parseIsoDate(now);
    if (parsed) return parsed;
  }
  return new Date();
};
