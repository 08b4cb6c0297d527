export interface CliOptions {
  from?: Date;
  to?: Date;
  leagueId?: number;
  teamId?: string;
  limit?: number;
  cursor?: string;
  resume: boolean;
  syncHeroes: boolean;
  checkpointPath: string;
}

const DEFAULT_CHECKPOINT_PATH = "./data/ingest-checkpoint.json";

function parseDate(name: string, raw: string | undefined): Date | undefined {
  if (raw === undefined) return undefined;
  const date = new Date(raw);
  if (!Number.isFinite(date.getTime())) throw new Error(`--${name} must be an ISO date, got "${raw}".`);
  return date;
}

function parsePositiveInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) throw new Error(`--${name} must be a positive integer, got "${raw}".`);
  return value;
}

function parseNumericId(name: string, raw: string | undefined): string | undefined {
  if (raw === undefined) return undefined;
  if (!/^[1-9]\d*$/.test(raw)) throw new Error(`--${name} must be a numeric id, got "${raw}".`);
  return raw;
}

export function parseCliOptions(args: string[]): CliOptions {
  const read = (name: string): string | undefined => {
    const index = args.indexOf(`--${name}`);
    if (index >= 0 && index + 1 < args.length) return args[index + 1];
    return undefined;
  };
  const has = (name: string): boolean => args.includes(`--${name}`);

  const from = parseDate("from", read("from"));
  const to = parseDate("to", read("to"));
  if (from && to && from.getTime() > to.getTime()) {
    throw new Error("--from must not be after --to.");
  }

  return {
    from,
    to,
    leagueId: parsePositiveInt("league", read("league")),
    teamId: parseNumericId("team", read("team")),
    limit: parsePositiveInt("limit", read("limit")),
    cursor: parseNumericId("cursor", read("cursor")),
    resume: !has("no-resume"),
    syncHeroes: has("sync-heroes"),
    checkpointPath: read("checkpointPath") ?? DEFAULT_CHECKPOINT_PATH
  };
}
