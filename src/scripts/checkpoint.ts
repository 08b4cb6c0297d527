import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { IngestionSummary } from "../types/ingestion.js";
import type { CliOptions } from "./cliOptions.js";

const checkpointQuerySchema = z.object({
  from: z.string().nullable(),
  to: z.string().nullable(),
  leagueId: z.number().int().positive().nullable(),
  teamId: z.string().nullable()
});

export const checkpointSchema = z.object({
  version: z.literal(1),
  lastCursor: z.string().regex(/^\d+$/),
  savedAt: z.string(),
  query: checkpointQuerySchema
});

export type CheckpointQuery = z.infer<typeof checkpointQuerySchema>;
export type IngestCheckpoint = z.infer<typeof checkpointSchema>;

function resolvePath(checkpointPath: string): string {
  return path.isAbsolute(checkpointPath) ? checkpointPath : path.resolve(process.cwd(), checkpointPath);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function checkpointQueryFor(options: Pick<CliOptions, "from" | "to" | "leagueId" | "teamId">): CheckpointQuery {
  return {
    from: options.from?.toISOString() ?? null,
    to: options.to?.toISOString() ?? null,
    leagueId: options.leagueId ?? null,
    teamId: options.teamId ?? null
  };
}

/** The saved cursor, only when the checkpoint was written for the same query bounds. */
export function resumeCursorFrom(checkpoint: IngestCheckpoint | null, query: CheckpointQuery): string | null {
  if (!checkpoint) return null;
  const saved = checkpoint.query;
  const sameQuery =
    saved.from === query.from &&
    saved.to === query.to &&
    saved.leagueId === query.leagueId &&
    saved.teamId === query.teamId;
  return sameQuery ? checkpoint.lastCursor : null;
}

/** A pass that was cancelled or stopped at its limit has older matches left to list. */
export function runLeftMatchesBehind(summary: IngestionSummary): boolean {
  if (summary.cancelled) return true;
  const limit = summary.query.limit;
  return limit !== undefined && summary.fetched >= limit;
}

export async function saveCheckpoint(
  checkpointPath: string,
  lastCursor: string,
  query: CheckpointQuery
): Promise<void> {
  const checkpoint: IngestCheckpoint = { version: 1, lastCursor, savedAt: new Date().toISOString(), query };
  const absolutePath = resolvePath(checkpointPath);
  await fs.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.writeFile(absolutePath, JSON.stringify(checkpoint, null, 2), "utf8");
}

export async function loadCheckpoint(checkpointPath: string): Promise<IngestCheckpoint | null> {
  let content: string;
  try {
    content = await fs.readFile(resolvePath(checkpointPath), "utf8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    raw = null;
  }
  const parsed = checkpointSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[cli] ignoring unreadable checkpoint at ${checkpointPath}`);
    return null;
  }
  return parsed.data;
}

export async function clearCheckpoint(checkpointPath: string): Promise<void> {
  try {
    await fs.unlink(resolvePath(checkpointPath));
  } catch (error) {
    if (!isMissingFile(error)) throw error;
  }
}
