import type { z } from "zod";
import type { Hero } from "../types/match.js";
import {
  heroListSchema,
  patchListSchema,
  proMatchListingSchema,
  type ProMatchListing
} from "../schemas/opendota.js";
import { FetchError, TransientFetchError } from "./errors.js";

interface OpenDotaClientConfig {
  baseUrl?: string;
  apiKey?: string;
  minIntervalMs?: number;
  requestTimeoutMs?: number;
  rateLimitCooldownMs?: number;
  fetchImpl?: typeof fetch;
}

export interface PatchInfo {
  id: number;
  name: string;
}

const DEFAULT_BASE_URL = "https://api.opendota.com/api";

export class OpenDotaClient {
  private queue: Promise<void> = Promise.resolve();
  private lastRequestAtMs = 0;
  private cooldownUntilMs = 0;

  constructor(private readonly config: OpenDotaClientConfig = {}) {}

  private async sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise((resolve) => setTimeout(resolve, ms));
  }

  private getRetryAfterMs(response: Response): number | undefined {
    const retryAfter = response.headers.get("retry-after");
    if (!retryAfter) return undefined;
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds > 0) return Math.floor(seconds * 1000);
    return undefined;
  }

  private activateCooldown(delayMs: number | undefined): void {
    const fallback = this.config.rateLimitCooldownMs ?? 60_000;
    const durationMs = Math.max(delayMs ?? 0, fallback);
    this.cooldownUntilMs = Math.max(this.cooldownUntilMs, Date.now() + durationMs);
  }

  private enqueue<T>(handler: () => Promise<T>): Promise<T> {
    const task = this.queue.then(async () => {
      const minInterval = this.config.minIntervalMs ?? 1000;
      const now = Date.now();
      const waitMs = Math.max(0, this.lastRequestAtMs + minInterval - now);
      if (waitMs > 0) await this.sleep(waitMs);
      this.lastRequestAtMs = Date.now();
      return handler();
    });

    this.queue = task.then(
      () => undefined,
      () => undefined
    );
    return task;
  }

  private buildUrl(path: string, query?: Record<string, string | number>): string {
    const params = new URLSearchParams();
    if (query) {
      Object.entries(query).forEach(([key, value]) => {
        params.set(key, String(value));
      });
    }
    if (this.config.apiKey) params.set("api_key", this.config.apiKey);

    const base = (this.config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    const search = params.toString();
    return `${base}${path}${search ? `?${search}` : ""}`;
  }

  private async request(path: string, query?: Record<string, string | number>): Promise<unknown> {
    const url = this.buildUrl(path, query);
    const safeUrl = url.replace(/api_key=[^&]*/, "api_key=***");

    if (Date.now() < this.cooldownUntilMs) {
      const remainingMs = this.cooldownUntilMs - Date.now();
      throw new TransientFetchError(
        `OpenDota cooldown active (${Math.ceil(remainingMs / 1000)}s remaining) after rate limit.`,
        { url: safeUrl, retryAfterMs: remainingMs }
      );
    }

    const fetchImpl = this.config.fetchImpl ?? fetch;
    let response: Response;
    try {
      response = await this.enqueue(() =>
        fetchImpl(url, {
          method: "GET",
          headers: { Accept: "application/json" },
          signal: AbortSignal.timeout(this.config.requestTimeoutMs ?? 15_000)
        })
      );
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransientFetchError(`OpenDota request failed: ${detail}`, { url: safeUrl }, { cause: error });
    }

    if (!response.ok) {
      const text = (await response.text()).slice(0, 200);
      const message = `OpenDota ${response.status} ${response.statusText}: ${text}`;
      if (response.status === 429) {
        const retryAfterMs = this.getRetryAfterMs(response);
        this.activateCooldown(retryAfterMs);
        throw new TransientFetchError(message, { url: safeUrl, status: response.status, retryAfterMs });
      }
      if (response.status >= 500) {
        throw new TransientFetchError(message, { url: safeUrl, status: response.status });
      }
      throw new FetchError(message, { url: safeUrl, status: response.status });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new FetchError(`OpenDota returned a non-JSON body for ${path}`, { url: safeUrl, status: response.status }, {
        cause: error
      });
    }
  }

  private async requestParsed<S extends z.ZodType>(
    path: string,
    schema: S,
    query?: Record<string, string | number>
  ): Promise<z.infer<S>> {
    const body = await this.request(path, query);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(`OpenDota returned an unexpected shape for ${path}: ${parsed.error.message}`, {
        url: path
      });
    }
    return parsed.data;
  }

  /** Newest-first page of pro matches, strictly older than `lessThanMatchId` when given. */
  async getProMatches(lessThanMatchId?: string): Promise<ProMatchListing[]> {
    const body = await this.request("/proMatches", lessThanMatchId ? { less_than_match_id: lessThanMatchId } : undefined);
    if (!Array.isArray(body)) {
      throw new FetchError("OpenDota /proMatches did not return an array.", { url: "/proMatches" });
    }

    const listings: ProMatchListing[] = [];
    for (const entry of body) {
      const parsed = proMatchListingSchema.safeParse(entry);
      if (parsed.success) {
        listings.push(parsed.data);
      } else {
        console.warn("[opendota] skipping unreadable pro match listing entry:", parsed.error.issues[0]?.message);
      }
    }
    return listings;
  }

  async getMatch(matchId: string): Promise<unknown> {
    return this.request(`/matches/${encodeURIComponent(matchId)}`);
  }

  async getHeroes(): Promise<Hero[]> {
    const heroes = await this.requestParsed("/heroes", heroListSchema);
    return heroes.map((hero) => ({ heroId: hero.id, name: hero.localized_name }));
  }

  async getPatches(): Promise<PatchInfo[]> {
    const patches = await this.requestParsed("/constants/patch", patchListSchema);
    return patches.map((patch) => ({ id: patch.id, name: patch.name }));
  }
}
