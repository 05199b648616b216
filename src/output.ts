// CSV and JSON output generation

import { mkdir, writeFile } from "fs/promises";
import { join, resolve } from "path";
import { escapeCsv } from "./csv";
import type { PipelineResult } from "./pipeline";
import type { MedalRecord, ScoredEntry } from "./types";

export type OutputFormat = "csv" | "json";

/**
 * Convert the ranked leaderboard to CSV
 */
export function leaderboardToCSV(entries: readonly ScoredEntry[]): string {
  const headers = [
    "rank",
    "friend",
    "noc_1",
    "country_1",
    "gold_1",
    "silver_1",
    "bronze_1",
    "total_1",
    "points_1",
    "noc_2",
    "country_2",
    "gold_2",
    "silver_2",
    "bronze_2",
    "total_2",
    "points_2",
    "daily_double",
    "points_total",
    "total_medals",
  ];

  const rows: string[] = [headers.join(",")];

  for (const entry of entries) {
    const row = [
      entry.rank,
      escapeCsv(entry.displayName),
      entry.countryCode1,
      escapeCsv(entry.countryName1),
      entry.medals1.gold,
      entry.medals1.silver,
      entry.medals1.bronze,
      entry.medals1.total,
      entry.points1,
      entry.countryCode2 || "",
      escapeCsv(entry.countryName2),
      entry.medals2.gold,
      entry.medals2.silver,
      entry.medals2.bronze,
      entry.medals2.total,
      entry.points2,
      entry.dailyDoubleBonus,
      entry.pointsTotal,
      entry.totalMedals,
    ];
    rows.push(row.join(","));
  }

  return rows.join("\n");
}

/**
 * One line per medal event, grouped by country
 */
export function eventsToCSV(
  eventsByCountry: ReadonlyMap<string, readonly MedalRecord[]>,
): string {
  const headers = [
    "noc",
    "medal",
    "sport",
    "gender",
    "event",
    "full_event",
    "athlete",
    "url",
  ];

  const rows: string[] = [headers.join(",")];

  for (const [countryCode, records] of eventsByCountry) {
    for (const record of records) {
      const row = [
        countryCode,
        record.medal,
        escapeCsv(record.sport),
        escapeCsv(record.gender),
        escapeCsv(record.eventName),
        escapeCsv(record.fullEventLabel),
        escapeCsv(record.athlete),
        escapeCsv(record.sourceUrl),
      ];
      rows.push(row.join(","));
    }
  }

  return rows.join("\n");
}

/**
 * Convert a pipeline result to JSON; maps become plain objects
 */
export function resultToJSON(result: PipelineResult): string {
  return JSON.stringify(
    {
      leaderboard: result.leaderboard,
      totals: result.totals,
      eventsByCountry: Object.fromEntries(result.eventsByCountry),
      dailyDoubles: Object.fromEntries(result.dailyDoubles),
    },
    null,
    2,
  );
}

export function eventsToJSON(
  eventsByCountry: ReadonlyMap<string, readonly MedalRecord[]>,
): string {
  return JSON.stringify(Object.fromEntries(eventsByCountry), null, 2);
}

/**
 * Write leaderboard and events files; returns the paths written
 */
export async function writeOutputs(
  result: PipelineResult,
  outputDir: string,
  format: OutputFormat,
): Promise<string[]> {
  const resolvedDir = resolve(outputDir);
  await mkdir(resolvedDir, { recursive: true });

  const files: Array<[string, string]> =
    format === "csv"
      ? [
          ["leaderboard.csv", leaderboardToCSV(result.leaderboard)],
          ["events.csv", eventsToCSV(result.eventsByCountry)],
        ]
      : [
          ["leaderboard.json", resultToJSON(result)],
          ["events.json", eventsToJSON(result.eventsByCountry)],
        ];

  const paths: string[] = [];
  for (const [filename, content] of files) {
    const path = join(resolvedDir, filename);
    await writeFile(path, content, "utf-8");
    paths.push(path);
  }
  return paths;
}

export async function writeEvents(
  eventsByCountry: ReadonlyMap<string, readonly MedalRecord[]>,
  outputDir: string,
  format: OutputFormat,
): Promise<string> {
  const resolvedDir = resolve(outputDir);
  await mkdir(resolvedDir, { recursive: true });
  const path = join(resolvedDir, `events.${format}`);
  const content =
    format === "csv" ? eventsToCSV(eventsByCountry) : eventsToJSON(eventsByCountry);
  await writeFile(path, content, "utf-8");
  return path;
}
