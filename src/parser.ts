import { parseHTML } from "linkedom";
import { isEmptyCell, splitAthleteCountry } from "./athletes";
import type { CountryResolver } from "./countries";
import { dedupeRecords } from "./dedupe";
import { ParseError } from "./errors";
import {
  cellAt,
  columnIndex,
  createTable,
  findColumn,
  headerSet,
  type DataTable,
} from "./table";
import { canonicalize, escapeRegExp, normalize, stripFootnoteMarkers } from "./text";
import {
  MEDAL_TYPES,
  type CountryMedalTotals,
  type EventContext,
  type Gender,
  type MedalRecord,
  type MedalType,
  type ProgressCallback,
  type SportContext,
} from "./types";

export interface ExtractOptions {
  resolver: CountryResolver;
  /** Table index -> sport, for pages whose headings are unreliable */
  sportMapping?: ReadonlyMap<number, SportContext>;
  sourceUrl: string;
  onProgress?: ProgressCallback;
}

interface TableContext {
  sport: string;
  gender: Gender;
  /** A fixed gender applies to every row; otherwise rows are inferred */
  fixed: boolean;
}

/**
 * Extract one record per medal cell from medal-winner tables
 * (Event | Gold | Silver | Bronze). Tables without an event and a gold
 * column are not medal tables and are skipped.
 */
export function extractRecords(
  tables: readonly DataTable[],
  options: ExtractOptions,
): MedalRecord[] {
  const { resolver, sportMapping, sourceUrl, onProgress } = options;
  const records: MedalRecord[] = [];

  for (const table of tables) {
    const eventColumn = findColumn(table, (header) => header.includes("event"));
    const medalColumns = medalColumnsOf(table);
    if (eventColumn === -1 || medalColumns.gold === -1) continue;

    const context = resolveTableContext(table, sportMapping);
    if (!context) {
      onProgress?.(`Warning: No sport found for table ${table.index}, skipped`);
      continue;
    }

    let carriedGender = context.gender;
    let unresolved = 0;

    for (const row of table.rows) {
      const rawEvent = cellAt(row, eventColumn);
      if (!rawEvent.trim() || canonicalize(rawEvent) === "event") continue;

      const eventName = cleanEventName(rawEvent);
      if (!eventName) continue;

      let gender: Gender;
      if (context.fixed) {
        gender = context.gender;
      } else {
        const cue = inferGender(eventName);
        if (cue === null) {
          gender = carriedGender;
        } else {
          gender = cue;
          if (cue) carriedGender = cue;
        }
      }

      const fullEventLabel = buildEventLabel(context.sport, gender, eventName);

      for (const medal of MEDAL_TYPES) {
        const cell = cellAt(row, medalColumns[medal]);
        if (isEmptyCell(cell)) continue;

        const split = splitAthleteCountry(cell, resolver);
        if (!split) {
          unresolved++;
          continue;
        }

        records.push({
          sport: context.sport,
          gender,
          eventName,
          fullEventLabel,
          athlete: split.athlete,
          medal,
          countryCode: split.countryCode,
          sourceUrl,
        });
      }
    }

    if (unresolved > 0) {
      onProgress?.(
        `Warning: ${unresolved} medal cells without a known country in ${context.sport} (table ${table.index})`,
      );
    }
  }

  return dedupeRecords(records);
}

/**
 * Extract the podium of a page dedicated to a single event, whose result
 * table has a Medal column and a NOC/nation column.
 */
export function extractEventResults(
  tables: readonly DataTable[],
  event: EventContext,
  options: ExtractOptions,
): MedalRecord[] {
  const { resolver, sourceUrl, onProgress } = options;

  for (const table of tables) {
    const medalColumn = findColumn(table, (header) => header.startsWith("medal"));
    const countryColumn = findColumn(
      table,
      (header) =>
        header === "noc" ||
        header === "team" ||
        header.startsWith("nation") ||
        header.startsWith("country"),
    );
    if (medalColumn === -1 || countryColumn === -1) continue;

    const athleteColumn = findColumn(
      table,
      (header) => header.startsWith("athlete") || header === "name",
    );
    const fullEventLabel = buildEventLabel(
      event.sport,
      event.gender,
      event.eventName,
    );
    const records: MedalRecord[] = [];
    let unresolved = 0;

    for (const row of table.rows) {
      const medal = medalFromText(cellAt(row, medalColumn));
      if (!medal) continue;

      const countryCode = parseCountryCode(cellAt(row, countryColumn), resolver);
      if (!countryCode) {
        unresolved++;
        continue;
      }

      records.push({
        sport: event.sport,
        gender: event.gender,
        eventName: event.eventName,
        fullEventLabel,
        athlete:
          athleteColumn === -1
            ? ""
            : normalize(stripFootnoteMarkers(cellAt(row, athleteColumn))),
        medal,
        countryCode,
        sourceUrl,
      });
    }

    if (unresolved > 0) {
      onProgress?.(
        `Warning: ${unresolved} podium rows without a known country in ${fullEventLabel}`,
      );
    }
    return dedupeRecords(records);
  }

  return [];
}

function resolveTableContext(
  table: DataTable,
  sportMapping: ReadonlyMap<number, SportContext> | undefined,
): TableContext | null {
  const mapped = sportMapping?.get(table.index);
  if (mapped) {
    return {
      sport: mapped.sport,
      gender: mapped.gender,
      fixed: mapped.gender !== "",
    };
  }

  if (table.section) {
    return {
      sport: table.section,
      gender: inferGender(table.subsection) ?? "",
      fixed: false,
    };
  }

  return null;
}

function medalColumnsOf(table: DataTable): Record<MedalType, number> {
  return {
    gold: findColumn(table, (header) => header.startsWith("gold")),
    silver: findColumn(table, (header) => header.startsWith("silver")),
    bronze: findColumn(table, (header) => header.startsWith("bronze")),
  };
}

function medalFromText(text: string): MedalType | null {
  const key = canonicalize(text);
  return MEDAL_TYPES.find((medal) => key.startsWith(medal)) ?? null;
}

export function cleanEventName(raw: string): string {
  return normalize(
    stripFootnoteMarkers(raw.replaceAll(" details", "").replaceAll("details", "")),
  );
}

/**
 * Gender cue from event or heading text; null when the text has none.
 * Mixed and team events carry no gender prefix.
 */
export function inferGender(text: string): Gender | null {
  const lower = text.toLowerCase();
  if (/\b(women|ladies)/.test(lower)) return "Women's";
  if (/\bmen\b/.test(lower)) return "Men's";
  if (/\b(mixed|team)\b/.test(lower)) return "";
  return null;
}

const GENDER_STEMS: Record<Exclude<Gender, "">, string> = {
  "Men's": "men",
  "Women's": "women",
  Mixed: "mixed",
};

export function mentionsGender(eventName: string, gender: Gender): boolean {
  if (!gender) return false;
  const stem = escapeRegExp(GENDER_STEMS[gender]);
  return new RegExp(`(?<![\\p{L}\\p{N}])${stem}(?![\\p{L}\\p{N}])`, "iu").test(
    eventName,
  );
}

export function buildEventLabel(
  sport: string,
  gender: Gender,
  eventName: string,
): string {
  if (gender && !mentionsGender(eventName, gender)) {
    return `${gender} ${sport}: ${eventName}`;
  }
  return `${sport}: ${eventName}`;
}

/**
 * NOC from a cell holding a bare code ("NOR"), a code in parentheses
 * ("Norway (NOR)") or a country name.
 */
export function parseCountryCode(
  text: string,
  resolver: CountryResolver,
): string | null {
  const cleaned = cleanCountryName(text);
  if (!cleaned) return null;
  if (/^[A-Z]{3}$/.test(cleaned)) return cleaned;

  const parenthesised = cleaned.match(/\(([A-Z]{3})\)/);
  if (parenthesised) return parenthesised[1];

  return resolver.resolve(cleaned);
}

function cleanCountryName(text: string): string {
  return normalize(stripFootnoteMarkers(text).replace(/[*†‡]+/g, ""));
}

/**
 * Parse the overall medal table into per-country totals.
 * Throws ParseError when the page has no medal table or no country column.
 */
export function parseMedalTotals(
  tables: readonly DataTable[],
  resolver: CountryResolver,
  options: { source?: string; onProgress?: ProgressCallback } = {},
): CountryMedalTotals[] {
  const { source, onProgress } = options;

  const table = tables.find((candidate) => {
    const headers = headerSet(candidate);
    return headers.has("gold") && headers.has("silver") && headers.has("bronze");
  });
  if (!table) {
    throw new ParseError("Medal table not found", source);
  }

  const codeColumn = columnIndex(table, "noc");
  const nameColumn = findColumn(
    table,
    (header) =>
      header === "country" || header === "team" || header.startsWith("nation"),
  );
  if (codeColumn === -1 && nameColumn === -1) {
    throw new ParseError("NOC column not found", source);
  }

  const goldColumn = columnIndex(table, "gold");
  const silverColumn = columnIndex(table, "silver");
  const bronzeColumn = columnIndex(table, "bronze");
  const totalColumn = columnIndex(table, "total");

  const byCode = new Map<string, CountryMedalTotals>();
  let unresolved = 0;

  for (const row of table.rows) {
    if (canonicalize(cellAt(row, 0)).includes("total")) continue;

    const codeText = cleanCountryName(cellAt(row, codeColumn));
    const nameText = cleanCountryName(cellAt(row, nameColumn));
    const countryCode = /^[A-Z]{3}$/.test(codeText)
      ? codeText
      : parseCountryCode(codeText || nameText, resolver);
    if (!countryCode) {
      if (codeText || nameText) unresolved++;
      continue;
    }

    const gold = parseCount(cellAt(row, goldColumn));
    const silver = parseCount(cellAt(row, silverColumn));
    const bronze = parseCount(cellAt(row, bronzeColumn));
    const totalText = cellAt(row, totalColumn);
    const total = /\d/.test(totalText)
      ? parseCount(totalText)
      : gold + silver + bronze;

    const entry: CountryMedalTotals = {
      countryCode,
      countryName: (nameText || codeText).replace(/\s*\([A-Z]{3}\)$/, ""),
      gold,
      silver,
      bronze,
      total,
    };
    const existing = byCode.get(countryCode);
    if (!existing || entry.total > existing.total) {
      byCode.set(countryCode, entry);
    }
  }

  if (unresolved > 0) {
    onProgress?.(`Warning: ${unresolved} medal table rows without a known country`);
  }

  return Array.from(byCode.values());
}

/**
 * Non-negative integer from a count cell, 0 when the cell has no digits
 */
export function parseCount(text: string): number {
  const match = stripFootnoteMarkers(text).match(/\d+/);
  if (!match) return 0;
  return parseInt(match[0], 10) || 0;
}

// JSON medal feeds

const TOTALS_HEADERS = ["noc", "country", "gold", "silver", "bronze", "total"];
const MEDAL_KEYS = ["gold", "silver", "bronze", "total", "medals"];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Find the first array of per-country medal rows anywhere in a payload
 */
export function extractMedalRows(payload: unknown): Record<string, unknown>[] {
  if (Array.isArray(payload)) {
    const items: unknown[] = payload;
    if (items.length > 0 && items.every(isRecord)) {
      const hasCode = items.some((item) => "noc" in item || "organisation" in item);
      const hasMedals = items.some((item) =>
        MEDAL_KEYS.some((key) => key in item),
      );
      if (hasCode && hasMedals) return items;
    }
    for (const item of items) {
      const found = extractMedalRows(item);
      if (found.length > 0) return found;
    }
    return [];
  }

  if (isRecord(payload)) {
    for (const value of Object.values(payload)) {
      const found = extractMedalRows(value);
      if (found.length > 0) return found;
    }
  }

  return [];
}

export function medalRowsToTable(rows: Record<string, unknown>[]): DataTable {
  return createTable(
    TOTALS_HEADERS,
    rows.map((row) => {
      const medals = isRecord(row.medals) ? row.medals : row;
      const gold = firstCount(medals, ["gold", "goldMedals", "gold_medals"]);
      const silver = firstCount(medals, ["silver", "silverMedals", "silver_medals"]);
      const bronze = firstCount(medals, ["bronze", "bronzeMedals", "bronze_medals"]);
      const total =
        firstCount(medals, ["total", "totalMedals", "total_medals"]) ||
        gold + silver + bronze;
      return [
        firstText(row, ["noc", "organisation", "countryCode", "code"]),
        firstText(row, [
          "country",
          "description",
          "name",
          "countryName",
          "organisation",
          "noc",
        ]),
        String(gold),
        String(silver),
        String(bronze),
        String(total),
      ];
    }),
  );
}

/**
 * Medal rows from a JSON body, or from the __NEXT_DATA__ script of an
 * HTML page that embeds its data.
 */
export function parseMedalsPayload(body: string, source?: string): DataTable {
  let json = body.trim();
  if (json.startsWith("<")) {
    const { document } = parseHTML(json);
    const script = document.querySelector("script#__NEXT_DATA__");
    if (!script?.textContent) {
      throw new ParseError("No embedded medal data found", source);
    }
    json = script.textContent;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    throw new ParseError("Invalid medal JSON", source, { cause: error });
  }

  const rows = extractMedalRows(payload);
  if (rows.length === 0) {
    throw new ParseError("No medal rows found in payload", source);
  }
  return medalRowsToTable(rows);
}

function firstText(record: Record<string, unknown>, keys: string[]): string {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) return value.trim();
    if (typeof value === "number") return String(value);
  }
  return "";
}

function firstCount(record: Record<string, unknown>, keys: string[]): number {
  for (const key of keys) {
    const value = record[key];
    const count =
      typeof value === "number"
        ? value
        : typeof value === "string"
          ? parseInt(value, 10)
          : NaN;
    if (Number.isFinite(count) && count > 0) return Math.floor(count);
  }
  return 0;
}
