import type { PipelineConfig } from "./config";
import { createCountryResolver } from "./countries";
import { classifyDailyDoubles, tallyMedals } from "./daily-double";
import { dedupeRecords, groupByCountry } from "./dedupe";
import { loadRoster } from "./roster";
import { scoreRoster } from "./scoring";
import { fetchMedalEvents, fetchMedalTotals } from "./scraper";
import type { TextFetcher } from "./sources";
import type {
  CountryMedalTotals,
  MedalRecord,
  ProgressCallback,
  RosterEntry,
  ScoredEntry,
} from "./types";

export interface PipelineInput {
  roster: readonly RosterEntry[];
  totals: readonly CountryMedalTotals[];
  records: readonly MedalRecord[];
}

export interface PipelineResult {
  leaderboard: ScoredEntry[];
  eventsByCountry: Map<string, MedalRecord[]>;
  /** Descriptor name -> medals won in that bonus event */
  dailyDoubles: Map<string, MedalRecord[]>;
  totals: CountryMedalTotals[];
}

/**
 * Fold fetched data into the leaderboard. Pure: same input, same result.
 */
export function buildLeaderboard(
  input: PipelineInput,
  config: Pick<PipelineConfig, "dailyDoubles" | "scoring">,
): PipelineResult {
  const records = dedupeRecords(input.records);
  const dailyDoubles = classifyDailyDoubles(records, config.dailyDoubles);
  const bonusTotals = tallyMedals(Array.from(dailyDoubles.values()).flat());
  const totalsByCode = new Map(
    input.totals.map((entry) => [entry.countryCode, entry]),
  );

  return {
    leaderboard: scoreRoster(
      input.roster,
      totalsByCode,
      bonusTotals,
      config.scoring,
    ),
    eventsByCountry: groupByCountry(records),
    dailyDoubles,
    totals: [...input.totals],
  };
}

export interface RunOptions {
  rosterFile: string;
  cacheFile?: string;
  fetchText?: TextFetcher;
  onProgress?: ProgressCallback;
}

export interface RunResult extends PipelineResult {
  usedCache: boolean;
  totalsSource: string;
}

export async function runPipeline(
  config: PipelineConfig,
  options: RunOptions,
): Promise<RunResult> {
  const { rosterFile, cacheFile, fetchText, onProgress } = options;

  const roster = await loadRoster(rosterFile);
  onProgress?.(`Loaded ${roster.length} roster entries`);

  const resolver = createCountryResolver(config.countries);
  const totals = await fetchMedalTotals(config.totalsSources, {
    resolver,
    cacheFile,
    fetchText,
    timeoutMs: config.timeoutMs,
    onProgress,
  });
  const records = await fetchMedalEvents(config.eventSources, {
    resolver,
    sportMapping: config.sportMapping,
    fetchText,
    timeoutMs: config.timeoutMs,
    delayMs: config.delayMs,
    onProgress,
  });

  return {
    ...buildLeaderboard({ roster, totals: totals.totals, records }, config),
    usedCache: totals.usedCache,
    totalsSource: totals.source,
  };
}
