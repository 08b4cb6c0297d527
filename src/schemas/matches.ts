import { z } from "zod";
import { MAX_PAGE_SIZE, parseMatchCursor } from "../services/matchStore.js";

const isoDate = z
  .string()
  .trim()
  .refine((value) => Number.isFinite(Date.parse(value)), { message: "Expected an ISO date or datetime." })
  .transform((value) => new Date(value));

const positiveInt = z.coerce.number().int().positive();

export const matchListQuerySchema = z
  .object({
    from: isoDate.optional(),
    to: isoDate.optional(),
    teamId: z.string().trim().regex(/^[1-9]\d*$/).optional(),
    patch: z.string().trim().min(1).max(20).optional(),
    leagueId: positiveInt.optional(),
    limit: positiveInt.max(MAX_PAGE_SIZE).optional(),
    cursor: z
      .string()
      .refine((value) => parseMatchCursor(value) !== null, { message: "Invalid cursor." })
      .optional()
  })
  .refine((data) => !data.from || !data.to || data.from.getTime() <= data.to.getTime(), {
    message: "from must not be after to.",
    path: ["from"]
  });

export const ingestRequestSchema = z
  .object({
    from: isoDate.optional(),
    to: isoDate.optional(),
    leagueId: positiveInt.optional(),
    teamId: z.string().trim().regex(/^[1-9]\d*$/).optional(),
    cursor: z.string().trim().regex(/^[1-9]\d*$/).optional(),
    limit: positiveInt.max(5000).optional()
  })
  .strict()
  .refine((data) => !data.from || !data.to || data.from.getTime() <= data.to.getTime(), {
    message: "from must not be after to.",
    path: ["from"]
  });

export type MatchListQueryInput = z.infer<typeof matchListQuerySchema>;
export type IngestRequestInput = z.infer<typeof ingestRequestSchema>;
