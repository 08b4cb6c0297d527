import { z } from "zod";

function numericStringToNumber(value: unknown): unknown {
  if (typeof value === "string" && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) return Number(value);
  return value;
}

// OpenDota reports a missing league, series or team as 0.
function zeroAsMissing(value: unknown): unknown {
  const numeric = numericStringToNumber(value);
  return numeric === 0 ? null : numeric;
}

function bitToBoolean(value: unknown): unknown {
  if (value === 1) return true;
  if (value === 0) return false;
  return value;
}

const idField = z.preprocess(numericStringToNumber, z.number().int().positive());
const optionalIdField = z.preprocess(zeroAsMissing, z.number().int().positive().nullish());
const optionalCountField = z.preprocess(numericStringToNumber, z.number().int().nonnegative().nullish());

export const proMatchListingSchema = z.object({
  match_id: idField,
  start_time: z.preprocess(numericStringToNumber, z.number().nonnegative()),
  leagueid: optionalIdField,
  radiant_team_id: optionalIdField,
  dire_team_id: optionalIdField
});

export type ProMatchListing = z.infer<typeof proMatchListingSchema>;

const rawDraftEntrySchema = z.object({
  is_pick: z.preprocess(bitToBoolean, z.boolean()),
  hero_id: idField,
  team: z.union([z.literal(0), z.literal(1)]),
  order: optionalCountField
});

const rawTeamSchema = z.object({
  team_id: optionalIdField,
  name: z.string().nullish()
});

export const rawMatchDetailSchema = z.object({
  match_id: idField,
  start_time: z.preprocess(numericStringToNumber, z.union([z.number().nonnegative(), z.string().min(1)])),
  duration: z.preprocess(numericStringToNumber, z.number().nonnegative()),
  patch: z.union([z.number().int().nonnegative(), z.string()]),
  radiant_team_id: optionalIdField,
  dire_team_id: optionalIdField,
  radiant_team: rawTeamSchema.nullish(),
  dire_team: rawTeamSchema.nullish(),
  radiant_name: z.string().nullish(),
  dire_name: z.string().nullish(),
  radiant_win: z.preprocess(bitToBoolean, z.boolean()),
  picks_bans: z.array(rawDraftEntrySchema),
  leagueid: optionalIdField,
  series_id: optionalIdField,
  radiant_score: optionalCountField,
  dire_score: optionalCountField
});

export type RawMatchDetail = z.infer<typeof rawMatchDetailSchema>;

export const heroListSchema = z.array(
  z.object({
    id: idField,
    localized_name: z.string().min(1)
  })
);

export const patchListSchema = z.array(
  z.object({
    id: z.preprocess(numericStringToNumber, z.number().int().nonnegative()),
    name: z.string().min(1)
  })
);
