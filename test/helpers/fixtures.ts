import type { MatchRecord } from "../../src/types/match.js";

export type RawPayload = Record<string, unknown>;

export const rawMatch = (overrides: RawPayload = {}): RawPayload => ({
  match_id: 7100000001,
  start_time: 1717243200,
  duration: 2400,
  patch: 56,
  leagueid: 16700,
  series_id: 880001,
  radiant_team_id: 111,
  dire_team_id: 222,
  radiant_team: { team_id: 111, name: "Team Alpha" },
  dire_team: { team_id: 222, name: "Team Bravo" },
  radiant_win: true,
  radiant_score: 31,
  dire_score: 17,
  picks_bans: [
    { is_pick: false, hero_id: 14, team: 0, order: 0 },
    { is_pick: false, hero_id: 8, team: 1, order: 1 },
    { is_pick: true, hero_id: 1, team: 0, order: 2 },
    { is_pick: true, hero_id: 2, team: 1, order: 3 },
  ],
  ...overrides,
});

export const sampleRecord = (overrides: Partial<MatchRecord> = {}): MatchRecord => ({
  matchId: "7100000001",
  startTime: "2024-06-01T12:00:00.000Z",
  durationSeconds: 2400,
  patch: "7.36",
  leagueId: 16700,
  seriesId: 880001,
  radiant: { teamId: "111", name: "Team Alpha" },
  dire: { teamId: "222", name: "Team Bravo" },
  radiantScore: 31,
  direScore: 17,
  winnerTeamId: "111",
  draft: {
    radiant: [
      { order: 0, heroId: 14, isPick: false },
      { order: 2, heroId: 1, isPick: true },
    ],
    dire: [
      { order: 1, heroId: 8, isPick: false },
      { order: 3, heroId: 2, isPick: true },
    ],
  },
  ...overrides,
});

export const silentLogger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
