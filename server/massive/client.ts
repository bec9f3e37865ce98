import { LRUCache } from "lru-cache";
import { MassiveApiError, MissingApiKeyError } from "../lib/errors.js";
import { isJsonObject, type JsonValue } from "../lib/json.js";
import { createLogger } from "../lib/logger.js";

const log = createLogger("Massive");

export const DEFAULT_MASSIVE_BASE = "https://api.massive.com";
// Massive caps ticker.any_of and limit at 250
export const MAX_TICKERS_PER_REQUEST = 250;
export const MAX_RETRY_AFTER_MS = 10_000;

export type MassiveQuery = Record<string, string | number | boolean | null | undefined>;

export interface CallMassiveResult {
  ok: boolean;
  status: number;
  error?: string;
  data: JsonValue;
}

export interface MassiveResultsPage {
  status: string;
  results: JsonValue[];
  [key: string]: JsonValue;
}

export interface MassiveClientOptions {
  apiKey?: string;
  baseUrl?: string;
  /** attempts per request, including the first */
  tries?: number;
  timeoutMs?: number;
  /** linear backoff unit for 5xx and network failures */
  retryBaseMs?: number;
  contractsCacheTtlMs?: number;
}

function withTimeout(ms: number) {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), ms);
  return { signal: controller.signal, done: () => clearTimeout(timer) };
}

/**
 * Delay before retrying a 429. Only the delta-seconds form of Retry-After is
 * honoured; missing, dated or negative values wait one second.
 */
export function retryAfterMs(header: string | null): number {
  const seconds = Number(header ?? "");
  if (!header || !Number.isFinite(seconds) || seconds < 0) return 1000;
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function parseJson(input: string): JsonValue {
  if (!input) return {};
  try {
    return JSON.parse(input);
  } catch {
    return input;
  }
}

function extractError(payload: JsonValue): string | undefined {
  if (!isJsonObject(payload)) return undefined;
  const { error, message } = payload;
  if (typeof error === "string") return error;
  if (typeof message === "string") return message;
  return undefined;
}

export function buildQueryString(query: MassiveQuery = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== null && value !== "") {
      params.append(key, String(value));
    }
  }
  const qs = params.toString();
  return qs ? `?${qs}` : "";
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

function toResultsPage(payload: JsonValue): MassiveResultsPage {
  if (isJsonObject(payload)) {
    const results = payload.results;
    return {
      ...payload,
      status: typeof payload.status === "string" ? payload.status : "OK",
      results: Array.isArray(results) ? results : [],
    };
  }
  return { status: "OK", results: Array.isArray(payload) ? payload : [] };
}

/**
 * Thin REST client for the Massive options endpoints.
 *
 * The API key is checked per call so the MCP server can start (and answer
 * pure codec tools) without one.
 */
export class MassiveClient {
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly tries: number;
  private readonly timeoutMs: number;
  private readonly retryBaseMs: number;
  private readonly contractsCache: LRUCache<string, MassiveResultsPage>;

  constructor(options: MassiveClientOptions = {}) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_MASSIVE_BASE).replace(/\/+$/, "");
    this.tries = Math.max(1, options.tries ?? 3);
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retryBaseMs = options.retryBaseMs ?? 500;
    this.contractsCache = new LRUCache<string, MassiveResultsPage>({
      max: 200,
      ttl: options.contractsCacheTtlMs ?? 30_000,
    });
  }

  get hasApiKey(): boolean {
    return Boolean(this.apiKey);
  }

  private buildHeaders(): Record<string, string> {
    if (!this.apiKey) throw new MissingApiKeyError();
    return {
      Accept: "application/json",
      Authorization: `Bearer ${this.apiKey}`,
    };
  }

  async callMassive(path: string, query: MassiveQuery = {}): Promise<CallMassiveResult> {
    const headers = this.buildHeaders();
    const url = `${this.baseUrl}${path}${buildQueryString(query)}`;

    let lastError: unknown;
    let lastResponse: CallMassiveResult | null = null;

    for (let attempt = 0; attempt < this.tries; attempt++) {
      const isLastAttempt = attempt === this.tries - 1;
      const backoff = Math.min(this.retryBaseMs * (attempt + 1), 2000);
      const { signal, done } = withTimeout(this.timeoutMs);
      try {
        const response = await fetch(url, { method: "GET", headers, signal });
        const text = await response.text();
        done();

        const data = parseJson(text);
        const result: CallMassiveResult = {
          ok: response.ok,
          status: response.status,
          error: extractError(data),
          data,
        };
        lastResponse = result;

        if (response.status === 429 && !isLastAttempt) {
          const delay = retryAfterMs(response.headers.get("Retry-After"));
          log.warn("Rate limited, retrying", { path, delayMs: delay });
          await sleep(delay);
          continue;
        }

        if (response.status >= 500 && response.status < 600 && !isLastAttempt) {
          log.warn("Upstream error, retrying", { path, status: response.status, attempt });
          await sleep(backoff);
          continue;
        }

        return result;
      } catch (error) {
        done();
        lastError = error;
        log.warn("Request failed", {
          path,
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });
        if (!isLastAttempt) await sleep(backoff);
      }
    }

    if (lastResponse) return lastResponse;
    throw lastError instanceof Error ? lastError : new Error("callMassive: failed to reach Massive");
  }

  private async getPage(path: string, query: MassiveQuery, what: string): Promise<MassiveResultsPage> {
    const res = await this.callMassive(path, query);
    if (!res.ok) {
      throw new MassiveApiError(res.status, res.error ?? `failed to fetch ${what}`);
    }
    return toResultsPage(res.data);
  }

  /**
   * Snapshot a batch of option contracts by OCC ticker through the unified
   * snapshot endpoint. Batches above 250 tickers are split; results come back
   * in request order.
   */
  async getOptionSnapshots(tickers: string[]): Promise<MassiveResultsPage> {
    if (tickers.length === 0) return { status: "OK", results: [] };

    const results: JsonValue[] = [];
    for (const batch of chunk(tickers, MAX_TICKERS_PER_REQUEST)) {
      log.debug("Fetching option snapshots", { count: batch.length });
      const page = await this.getPage(
        "/v3/snapshot",
        { "ticker.any_of": batch.join(","), limit: MAX_TICKERS_PER_REQUEST },
        "option snapshots"
      );
      results.push(...page.results);
    }
    return { status: "OK", results };
  }

  async getOptionChain(underlying: string, filters: MassiveQuery = {}): Promise<MassiveResultsPage> {
    const symbol = encodeURIComponent(underlying.toUpperCase());
    return this.getPage(`/v3/snapshot/options/${symbol}`, filters, "option chain");
  }

  async listOptionContracts(filters: MassiveQuery): Promise<MassiveResultsPage> {
    const key = buildQueryString(filters);
    const cached = this.contractsCache.get(key);
    if (cached) {
      log.debug("Contracts cache hit", { key });
      return cached;
    }

    const page = await this.getPage("/v3/reference/options/contracts", filters, "option contracts");
    this.contractsCache.set(key, page);
    return page;
  }
}
