import { tallyMedals } from "../daily-double";
import { dedupeRecords } from "../dedupe";
import type { CountryMedalTotals, MedalRecord, MedalType } from "../types";
import { MEDAL_TYPES } from "../types";
import type { ValidationSummary, ValidationWarning } from "./types";

/**
 * Compare medals derived from event tables with the medal table.
 * A team medal counts once per country, however many athletes it lists.
 */
export function validateEventCoverage(
  totals: readonly CountryMedalTotals[],
  eventsByCountry: ReadonlyMap<string, readonly MedalRecord[]>,
): ValidationSummary {
  const warnings: ValidationWarning[] = [];
  const flagged = new Set<string>();

  const records = Array.from(eventsByCountry.values()).flat();
  const perEvent = dedupeRecords(records, [
    "sport",
    "gender",
    "eventName",
    "medal",
    "countryCode",
  ]);
  const counted = tallyMedals(perEvent);
  const totalsByCode = new Map(totals.map((entry) => [entry.countryCode, entry]));

  for (const entry of totals) {
    const counts = counted.get(entry.countryCode);
    const mismatched: MedalType[] = MEDAL_TYPES.filter(
      (medal) => (counts?.[medal] ?? 0) !== entry[medal],
    );
    if (mismatched.length === 0) continue;

    const describe = (medal: MedalType) =>
      `${medal} ${counts?.[medal] ?? 0}/${entry[medal]}`;
    warnings.push({
      severity: "warning",
      rule: "medal_count",
      message: `${entry.countryCode}: events disagree with medal table (${mismatched.map(describe).join(", ")})`,
      countryCode: entry.countryCode,
      details: {
        events: counts ?? null,
        table: { gold: entry.gold, silver: entry.silver, bronze: entry.bronze },
      },
    });
    flagged.add(entry.countryCode);
  }

  for (const [countryCode, counts] of counted) {
    if (totalsByCode.has(countryCode)) continue;
    warnings.push({
      severity: "warning",
      rule: "missing_totals",
      message: `${countryCode}: ${counts.total} event medals but no medal table row`,
      countryCode,
      details: { events: counts },
    });
    flagged.add(countryCode);
  }

  const warningsByRule: ValidationSummary["warningsByRule"] = {};
  for (const warning of warnings) {
    warningsByRule[warning.rule] = (warningsByRule[warning.rule] || 0) + 1;
  }

  return {
    totalCountries: new Set([...totalsByCode.keys(), ...counted.keys()]).size,
    countriesWithWarnings: flagged.size,
    warningsByRule,
    allWarnings: warnings,
  };
}
