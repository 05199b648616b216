import { DEFAULT_CACHE_FILE, readMedalCache, writeMedalCache } from "./cache";
import type { CountryResolver } from "./countries";
import { dedupeRecords } from "./dedupe";
import { ConfigError, NetworkError, ParseError, errorMessage } from "./errors";
import { extractEventResults, extractRecords, parseMedalTotals } from "./parser";
import type { FetchOptions, TableSource, TextFetcher } from "./sources";
import type {
  CountryMedalTotals,
  MedalRecord,
  ProgressCallback,
  SportContext,
} from "./types";

export const DEFAULT_TIMEOUT_MS = 20_000;

const USER_AGENT = "Mozilla/5.0 (compatible; medal-draft/1.0)";

/**
 * GET a page as text. Every failure, including a non-2xx status, is a
 * NetworkError.
 */
export async function fetchText(
  url: string,
  options: FetchOptions = {},
): Promise<string> {
  const { accept = "text/html", timeoutMs = DEFAULT_TIMEOUT_MS } = options;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { "User-Agent": USER_AGENT, Accept: accept },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const reason =
      error instanceof Error && error.name === "TimeoutError"
        ? `timed out after ${timeoutMs}ms`
        : errorMessage(error);
    throw new NetworkError(`Failed to fetch ${url}: ${reason}`, url, {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new NetworkError(
      `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
      url,
      { status: response.status },
    );
  }

  try {
    return await response.text();
  } catch (error) {
    throw new NetworkError(`Failed to read ${url}: ${errorMessage(error)}`, url, {
      cause: error,
    });
  }
}

function withTimeout(fetcher: TextFetcher, timeoutMs: number | undefined): TextFetcher {
  if (timeoutMs === undefined) return fetcher;
  return (url, options = {}) => fetcher(url, { timeoutMs, ...options });
}

interface TotalsOptions {
  resolver: CountryResolver;
  cacheFile?: string;
  fetchText?: TextFetcher;
  timeoutMs?: number;
  onProgress?: ProgressCallback;
}

export interface TotalsResult {
  totals: CountryMedalTotals[];
  /** URL the totals came from, or the cache file path */
  source: string;
  usedCache: boolean;
}

/**
 * Fetch the medal table from the first source that answers. Network
 * failures fall through to the next source and finally to the cache.
 * A page that answers but cannot be parsed is fatal, unless an earlier
 * source already failed: then it is only a failed fallback.
 */
export async function fetchMedalTotals(
  sources: readonly TableSource[],
  options: TotalsOptions,
): Promise<TotalsResult> {
  const { resolver, cacheFile = DEFAULT_CACHE_FILE, onProgress } = options;
  const fetcher = withTimeout(options.fetchText ?? fetchText, options.timeoutMs);
  let lastError: NetworkError | null = null;

  for (const source of sources) {
    onProgress?.(`Fetching medal table from ${source.label}...`);

    let totals: CountryMedalTotals[];
    try {
      const tables = await source.fetchTables(fetcher);
      totals = parseMedalTotals(tables, resolver, {
        source: source.url,
        onProgress,
      });
    } catch (error) {
      if (error instanceof NetworkError) {
        lastError = error;
        onProgress?.(`Warning: ${error.message}`);
        continue;
      }
      if (error instanceof ParseError && lastError !== null) {
        onProgress?.(`Warning: Fallback ${source.label} unusable: ${error.message}`);
        continue;
      }
      throw error;
    }

    onProgress?.(`Found medal totals for ${totals.length} countries`);

    try {
      await writeMedalCache(totals, cacheFile);
    } catch (error) {
      onProgress?.(`Warning: Cache not written: ${errorMessage(error)}`);
    }

    return { totals, source: source.url, usedCache: false };
  }

  const cached = await readMedalCache(cacheFile);
  if (cached) {
    onProgress?.("Warning: Using cached medal data (network request failed)");
    return { totals: cached, source: cacheFile, usedCache: true };
  }

  throw lastError ?? new ConfigError("No medal table sources configured");
}

interface EventsOptions {
  resolver: CountryResolver;
  sportMapping?: ReadonlyMap<number, SportContext>;
  fetchText?: TextFetcher;
  timeoutMs?: number;
  delayMs?: number;
  onProgress?: ProgressCallback;
}

/**
 * Fetch and extract medal events from every source in turn. A source that
 * fails contributes no records; the others are unaffected.
 */
export async function fetchMedalEvents(
  sources: readonly TableSource[],
  options: EventsOptions,
): Promise<MedalRecord[]> {
  const { resolver, sportMapping, delayMs = 1000, onProgress } = options;
  const fetcher = withTimeout(options.fetchText ?? fetchText, options.timeoutMs);
  const records: MedalRecord[] = [];

  for (let i = 0; i < sources.length; i++) {
    const source = sources[i];
    const prefix = `[${i + 1}/${sources.length}]`;
    onProgress?.(`${prefix} Fetching ${source.label}`);

    try {
      const tables = await source.fetchTables(fetcher);
      const extractOptions = {
        resolver,
        sportMapping,
        sourceUrl: source.url,
        onProgress,
      };

      let found: MedalRecord[] = [];
      if (source.kind === "per-sport") {
        found = extractEventResults(tables, source.event, extractOptions);
      } else if (source.kind === "wikipedia") {
        found = extractRecords(tables, extractOptions);
      } else {
        onProgress?.(`Warning: ${source.label} has no event results`);
      }

      onProgress?.(`Found ${found.length} medal records`);
      records.push(...found);
    } catch (error) {
      onProgress?.(`Warning: Skipped ${source.label}: ${errorMessage(error)}`);
    }

    // Rate limit between requests
    if (i < sources.length - 1 && delayMs > 0) {
      await new Promise((r) => setTimeout(r, delayMs));
    }
  }

  return dedupeRecords(records);
}
