import { rawMatchDetailSchema, type RawMatchDetail } from "../schemas/opendota.js";
import type { DraftEntry, MatchRecord, Team } from "../types/match.js";
import { resolvePatchName } from "../utils/patch.js";
import { MalformedRecordError } from "./errors.js";

export interface NormalizeContext {
  patchNames?: ReadonlyMap<number, string>;
}

type Side = "radiant" | "dire";

function readMatchIdHint(payload: unknown): string | undefined {
  if (typeof payload !== "object" || payload === null || !("match_id" in payload)) return undefined;
  const raw = payload.match_id;
  if (typeof raw === "number" || (typeof raw === "string" && raw.trim().length > 0)) return String(raw).trim();
  return undefined;
}

function toIsoStartTime(raw: number | string, matchId: string): string {
  const date = typeof raw === "number" ? new Date(raw * 1000) : new Date(raw);
  if (!Number.isFinite(date.getTime())) {
    throw new MalformedRecordError(`Match ${matchId} has an unreadable start_time "${raw}".`, {
      matchId,
      field: "start_time"
    });
  }
  return date.toISOString();
}

function readTeam(detail: RawMatchDetail, side: Side, matchId: string): Team {
  const nested = side === "radiant" ? detail.radiant_team : detail.dire_team;
  const teamId = (side === "radiant" ? detail.radiant_team_id : detail.dire_team_id) ?? nested?.team_id;
  if (!teamId) {
    throw new MalformedRecordError(`Match ${matchId} is missing its ${side} team.`, {
      matchId,
      field: `${side}_team_id`
    });
  }

  const listedName = side === "radiant" ? detail.radiant_name : detail.dire_name;
  const name = nested?.name?.trim() || listedName?.trim() || `Team ${teamId}`;
  return { teamId: String(teamId), name };
}

function readPatch(raw: number | string, matchId: string, context: NormalizeContext): string {
  if (typeof raw === "number") return resolvePatchName(raw, context.patchNames);
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new MalformedRecordError(`Match ${matchId} has an empty patch.`, { matchId, field: "patch" });
  }
  return trimmed;
}

function splitDraft(detail: RawMatchDetail): MatchRecord["draft"] {
  const ordered = detail.picks_bans
    .map((entry, index) => ({ entry, order: entry.order ?? index }))
    .sort((a, b) => a.order - b.order);

  const radiant: DraftEntry[] = [];
  const dire: DraftEntry[] = [];
  for (const { entry, order } of ordered) {
    const draftEntry: DraftEntry = { order, heroId: entry.hero_id, isPick: entry.is_pick };
    if (entry.team === 0) radiant.push(draftEntry);
    else dire.push(draftEntry);
  }
  return { radiant, dire };
}

/**
 * Maps one OpenDota match detail payload onto a {@link MatchRecord}.
 * Throws {@link MalformedRecordError} when a required field is absent or cannot be coerced.
 */
export function normalizeMatch(payload: unknown, context: NormalizeContext = {}): MatchRecord {
  const parsed = rawMatchDetailSchema.safeParse(payload);
  if (!parsed.success) {
    const matchId = readMatchIdHint(payload);
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.map(String).join(".") : "payload";
    throw new MalformedRecordError(
      `Match ${matchId ?? "(unknown)"} has an invalid ${field}: ${issue?.message ?? "unreadable payload"}`,
      { matchId, field }
    );
  }

  const detail = parsed.data;
  const matchId = String(detail.match_id);
  const radiant = readTeam(detail, "radiant", matchId);
  const dire = readTeam(detail, "dire", matchId);
  if (radiant.teamId === dire.teamId) {
    throw new MalformedRecordError(`Match ${matchId} lists team ${radiant.teamId} on both sides.`, {
      matchId,
      field: "dire_team_id"
    });
  }

  return {
    matchId,
    startTime: toIsoStartTime(detail.start_time, matchId),
    durationSeconds: Math.round(detail.duration),
    patch: readPatch(detail.patch, matchId, context),
    leagueId: detail.leagueid ?? null,
    seriesId: detail.series_id ?? null,
    radiant,
    dire,
    radiantScore: detail.radiant_score ?? 0,
    direScore: detail.dire_score ?? 0,
    winnerTeamId: detail.radiant_win ? radiant.teamId : dire.teamId,
    draft: splitDraft(detail)
  };
}
