import type { MatchIngestionService } from "./ingestionService.js";

export interface ScheduledIngestionOptions {
  hourUtc: number;
  lookbackDays: number;
  limit?: number;
}

export interface ScheduledIngestionHandle {
  stop(): void;
}

export function msUntilNextRun(hourUtc: number, now = new Date()): number {
  const next = new Date(now);
  next.setUTCHours(hourUtc, 0, 0, 0);
  if (next.getTime() <= now.getTime()) {
    next.setUTCDate(next.getUTCDate() + 1);
  }
  return next.getTime() - now.getTime();
}

export function startScheduledIngestion(
  service: Pick<MatchIngestionService, "ingest">,
  options: ScheduledIngestionOptions
): ScheduledIngestionHandle {
  const clampedHour = Math.min(23, Math.max(0, Math.floor(options.hourUtc)));
  const lookbackMs = Math.max(1, options.lookbackDays) * 24 * 60 * 60 * 1000;
  let timer: NodeJS.Timeout | undefined;
  let controller: AbortController | undefined;
  let stopped = false;

  const runOnce = async (): Promise<void> => {
    controller = new AbortController();
    try {
      const summary = await service.ingest(
        { from: new Date(Date.now() - lookbackMs), limit: options.limit },
        { signal: controller.signal }
      );
      console.log(
        `[scheduled-ingest] completed fetched=${summary.fetched} inserted=${summary.inserted} updated=${summary.updated} malformed=${summary.malformed} durationMs=${summary.durationMs}`
      );
    } catch (error) {
      console.error("[scheduled-ingest] failed:", error);
    } finally {
      controller = undefined;
    }
  };

  const scheduleNext = (): void => {
    if (stopped) return;
    timer = setTimeout(() => {
      void runOnce().finally(scheduleNext);
    }, msUntilNextRun(clampedHour));
  };

  scheduleNext();

  return {
    stop(): void {
      stopped = true;
      if (timer) clearTimeout(timer);
      controller?.abort();
    }
  };
}
