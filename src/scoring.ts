import { emptyCounts } from "./daily-double";
import type {
  CountryMedalTotals,
  MedalCounts,
  MedalType,
  RosterEntry,
  ScoredEntry,
} from "./types";

export interface ScoringRules {
  weights: Readonly<Record<MedalType, number>>;
  /** Country code -> factor applied to that country's points; default 1 */
  multipliers: Readonly<Record<string, number>>;
}

export const DEFAULT_WEIGHTS: Readonly<Record<MedalType, number>> = {
  gold: 3,
  silver: 2,
  bronze: 1,
};

export function medalPoints(
  counts: MedalCounts,
  weights: Readonly<Record<MedalType, number>> = DEFAULT_WEIGHTS,
): number {
  return (
    counts.gold * weights.gold +
    counts.silver * weights.silver +
    counts.bronze * weights.bronze
  );
}

export function multiplierFor(rules: ScoringRules, countryCode: string): number {
  return rules.multipliers[countryCode] ?? 1;
}

/**
 * Score and rank roster entries: points total, then combined medal count,
 * then roster order.
 */
export function scoreRoster(
  roster: readonly RosterEntry[],
  countryTotals: ReadonlyMap<string, CountryMedalTotals>,
  bonusTotals: ReadonlyMap<string, MedalCounts>,
  rules: ScoringRules,
): ScoredEntry[] {
  const sidePoints = (counts: MedalCounts, code: string) =>
    medalPoints(counts, rules.weights) * multiplierFor(rules, code);

  const bonusFor = (code: string | undefined) => {
    if (!code) return 0;
    const counts = bonusTotals.get(code);
    return counts ? sidePoints(counts, code) : 0;
  };

  const scored = roster.map((entry): Omit<ScoredEntry, "rank"> => {
    const totals1 = countryTotals.get(entry.countryCode1);
    const totals2 = entry.countryCode2
      ? countryTotals.get(entry.countryCode2)
      : undefined;
    const medals1 = totals1 ? countsOf(totals1) : emptyCounts();
    const medals2 = totals2 ? countsOf(totals2) : emptyCounts();

    const points1 = sidePoints(medals1, entry.countryCode1);
    const points2 = entry.countryCode2
      ? sidePoints(medals2, entry.countryCode2)
      : 0;
    const dailyDoubleBonus =
      bonusFor(entry.countryCode1) + bonusFor(entry.countryCode2);

    return {
      displayName: entry.displayName,
      countryCode1: entry.countryCode1,
      countryCode2: entry.countryCode2,
      countryName1: entry.countryName1 || totals1?.countryName || "",
      countryName2: entry.countryName2 || totals2?.countryName || "",
      medals1,
      medals2,
      points1,
      points2,
      dailyDoubleBonus,
      pointsTotal: points1 + points2 + dailyDoubleBonus,
      totalMedals: medals1.total + medals2.total,
    };
  });

  // Array.prototype.sort is stable, so roster order breaks remaining ties
  return scored
    .sort(
      (a, b) =>
        b.pointsTotal - a.pointsTotal || b.totalMedals - a.totalMedals,
    )
    .map((entry, index) => ({ rank: index + 1, ...entry }));
}

function countsOf(totals: CountryMedalTotals): MedalCounts {
  return {
    gold: totals.gold,
    silver: totals.silver,
    bronze: totals.bronze,
    total: totals.total,
  };
}
