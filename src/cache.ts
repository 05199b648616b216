import { existsSync } from "fs";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import { homedir } from "os";
import { dirname, join } from "path";
import { escapeCsv, parseCsv } from "./csv";
import { ParseError } from "./errors";
import { parseCount } from "./parser";
import type { CountryMedalTotals } from "./types";

export const DATA_DIR = join(homedir(), ".medal-draft");
export const DEFAULT_CACHE_FILE = join(DATA_DIR, "medals_cache.csv");

const CACHE_HEADERS = ["noc", "country", "gold", "silver", "bronze", "total"];

export function medalTotalsToCSV(totals: readonly CountryMedalTotals[]): string {
  const rows = [CACHE_HEADERS.join(",")];
  for (const entry of totals) {
    rows.push(
      [
        escapeCsv(entry.countryCode),
        escapeCsv(entry.countryName),
        entry.gold,
        entry.silver,
        entry.bronze,
        entry.total,
      ].join(","),
    );
  }
  return `${rows.join("\n")}\n`;
}

export function parseMedalCache(text: string, path?: string): CountryMedalTotals[] {
  const { headers, rows } = parseCsv(text);
  if (!headers.includes("noc")) {
    throw new ParseError("Medal cache has no noc column", path);
  }

  return rows
    .filter((row) => (row.noc ?? "").trim() !== "")
    .map((row) => {
      const gold = parseCount(row.gold ?? "");
      const silver = parseCount(row.silver ?? "");
      const bronze = parseCount(row.bronze ?? "");
      const totalText = row.total ?? "";
      return {
        countryCode: (row.noc ?? "").trim(),
        countryName: (row.country ?? "").trim(),
        gold,
        silver,
        bronze,
        total: /\d/.test(totalText) ? parseCount(totalText) : gold + silver + bronze,
      };
    });
}

export async function readMedalCache(
  path: string = DEFAULT_CACHE_FILE,
): Promise<CountryMedalTotals[] | null> {
  if (!existsSync(path)) {
    return null;
  }
  return parseMedalCache(await readFile(path, "utf-8"), path);
}

/**
 * Replace the cache atomically: write a temp file, then rename over.
 */
export async function writeMedalCache(
  totals: readonly CountryMedalTotals[],
  path: string = DEFAULT_CACHE_FILE,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const tempPath = `${path}.tmp`;
  try {
    await writeFile(tempPath, medalTotalsToCSV(totals), "utf-8");
    await rename(tempPath, path);
  } catch (error) {
    if (existsSync(tempPath)) {
      await unlink(tempPath).catch(() => undefined);
    }
    throw error;
  }
}
