import { readFile } from "fs/promises";
import { parseCsv } from "./csv";
import { ConfigError, errorMessage } from "./errors";
import type { RosterEntry } from "./types";

const REQUIRED_COLUMNS = ["friend", "noc_1", "noc_2"];

/**
 * Parse the friends roster. Single-country files may use the older
 * `noc`/`country` columns instead of `noc_1`/`country_1`.
 */
export function parseRoster(text: string): RosterEntry[] {
  const { headers, rows } = parseCsv(text);
  const columns = new Set(headers.map((header) => header.toLowerCase()));
  const legacy = columns.has("noc") && !columns.has("noc_1");

  if (legacy) {
    columns.add("noc_1");
    columns.add("noc_2");
  }

  const missing = REQUIRED_COLUMNS.filter((column) => !columns.has(column));
  if (missing.length > 0) {
    throw new ConfigError(
      `friends.csv missing columns: ${missing.sort().join(", ")}`,
    );
  }

  const entries: RosterEntry[] = [];
  const seen = new Set<string>();

  for (const row of rows) {
    const value = (column: string) => {
      const key = headers.find((header) => header.toLowerCase() === column);
      return key ? (row[key] ?? "").trim() : "";
    };

    const displayName = value("friend");
    if (!displayName) continue;
    if (seen.has(displayName)) {
      throw new ConfigError(`friends.csv lists "${displayName}" twice`);
    }
    seen.add(displayName);

    const countryCode1 = (legacy ? value("noc") : value("noc_1")).toUpperCase();
    if (!countryCode1) {
      throw new ConfigError(`friends.csv: "${displayName}" has no country`);
    }
    const countryCode2 = legacy ? "" : value("noc_2").toUpperCase();
    const countryName1 = legacy ? value("country") : value("country_1");
    const countryName2 = legacy ? "" : value("country_2");

    entries.push({
      displayName,
      countryCode1,
      countryCode2: countryCode2 || undefined,
      countryName1: countryName1 || undefined,
      countryName2: countryName2 || undefined,
    });
  }

  return entries;
}

export async function loadRoster(path: string): Promise<RosterEntry[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read roster ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseRoster(text);
}
