import { dedupeRecords, type RecordKeyField } from "./dedupe";
import { canonicalize, stripGenderPrefix } from "./text";
import type {
  DailyDoubleDescriptor,
  MedalCounts,
  MedalRecord,
} from "./types";

// A country's medal in a bonus event counts once, whoever won it
const BONUS_KEY_FIELDS: readonly RecordKeyField[] = [
  "sport",
  "gender",
  "eventName",
  "medal",
  "countryCode",
];

export function matchesDescriptor(
  record: MedalRecord,
  descriptor: DailyDoubleDescriptor,
): boolean {
  if (descriptor.sport && canonicalize(record.sport) !== canonicalize(descriptor.sport)) {
    return false;
  }
  if (
    descriptor.gender &&
    canonicalize(record.gender) !== canonicalize(descriptor.gender)
  ) {
    return false;
  }

  const event = canonicalize(record.eventName);

  if (descriptor.exactMatch.length > 0) {
    const bareEvent = canonicalize(stripGenderPrefix(record.eventName));
    const matched = descriptor.exactMatch.some((name) => {
      const wanted = canonicalize(name);
      return wanted === event || wanted === bareEvent;
    });
    if (!matched) return false;
  }

  if (descriptor.excludedKeywords.some((keyword) => event.includes(canonicalize(keyword)))) {
    return false;
  }

  return descriptor.requiredKeywords.every((keyword) =>
    event.includes(canonicalize(keyword)),
  );
}

/**
 * Assign each record to the first descriptor it satisfies. Every
 * descriptor gets an entry, empty until its event has been decided.
 */
export function classifyDailyDoubles(
  records: readonly MedalRecord[],
  descriptors: readonly DailyDoubleDescriptor[],
): Map<string, MedalRecord[]> {
  const matched = new Map<string, MedalRecord[]>();
  for (const descriptor of descriptors) {
    matched.set(descriptor.name, []);
  }

  for (const record of records) {
    const descriptor = descriptors.find((candidate) =>
      matchesDescriptor(record, candidate),
    );
    if (!descriptor) continue;
    matched.get(descriptor.name)?.push(record);
  }

  for (const [name, list] of matched) {
    matched.set(name, dedupeRecords(list, BONUS_KEY_FIELDS));
  }

  return matched;
}

export function emptyCounts(): MedalCounts {
  return { gold: 0, silver: 0, bronze: 0, total: 0 };
}

/**
 * Medal counts per country code
 */
export function tallyMedals(
  records: Iterable<MedalRecord>,
): Map<string, MedalCounts> {
  const tally = new Map<string, MedalCounts>();
  for (const record of records) {
    const counts = tally.get(record.countryCode) || emptyCounts();
    counts[record.medal]++;
    counts.total++;
    tally.set(record.countryCode, counts);
  }
  return tally;
}
