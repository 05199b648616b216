import type { MedalRecord } from "./types";
import { canonicalize, stripGenderPrefix } from "./text";

export type RecordKeyField =
  | "sport"
  | "gender"
  | "eventName"
  | "medal"
  | "countryCode"
  | "athlete";

export const RECORD_KEY_FIELDS: readonly RecordKeyField[] = [
  "sport",
  "gender",
  "eventName",
  "medal",
  "countryCode",
  "athlete",
];

export function recordKey(
  record: MedalRecord,
  fields: readonly RecordKeyField[] = RECORD_KEY_FIELDS,
): string {
  return fields
    .map((field) =>
      canonicalize(
        field === "eventName" ? stripGenderPrefix(record.eventName) : record[field],
      ),
    )
    .join("|");
}

/**
 * Drop records whose canonical key was already seen; first one wins.
 */
export function dedupeRecords(
  records: readonly MedalRecord[],
  fields: readonly RecordKeyField[] = RECORD_KEY_FIELDS,
): MedalRecord[] {
  const seen = new Set<string>();
  const unique: MedalRecord[] = [];

  for (const record of records) {
    const key = recordKey(record, fields);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(record);
  }

  return unique;
}

/**
 * Group records by country code, deduplicating again so the same medal
 * listed in several tables is counted once.
 */
export function groupByCountry(
  records: readonly MedalRecord[],
): Map<string, MedalRecord[]> {
  const byCountry = new Map<string, MedalRecord[]>();
  for (const record of dedupeRecords(records)) {
    const list = byCountry.get(record.countryCode) || [];
    list.push(record);
    byCountry.set(record.countryCode, list);
  }
  return byCountry;
}
