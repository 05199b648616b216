export type Gender = "Men's" | "Women's" | "Mixed" | "";

export type MedalType = "gold" | "silver" | "bronze";

export const MEDAL_TYPES: readonly MedalType[] = ["gold", "silver", "bronze"];

export interface MedalRecord {
  readonly sport: string;
  readonly gender: Gender;
  readonly eventName: string;
  readonly fullEventLabel: string;
  /** Empty for a team credit */
  readonly athlete: string;
  readonly medal: MedalType;
  readonly countryCode: string;
  readonly sourceUrl: string;
}

export interface MedalCounts {
  gold: number;
  silver: number;
  bronze: number;
  total: number;
}

export interface CountryMedalTotals extends MedalCounts {
  countryCode: string;
  countryName: string;
}

export interface RosterEntry {
  displayName: string;
  countryCode1: string;
  countryCode2?: string;
  countryName1?: string;
  countryName2?: string;
}

export interface DailyDoubleDescriptor {
  name: string;
  sport?: string;
  gender?: Gender;
  requiredKeywords: string[];
  excludedKeywords: string[];
  exactMatch: string[];
}

export interface ScoredEntry {
  rank: number;
  displayName: string;
  countryCode1: string;
  countryCode2?: string;
  countryName1: string;
  countryName2: string;
  medals1: MedalCounts;
  medals2: MedalCounts;
  points1: number;
  points2: number;
  dailyDoubleBonus: number;
  pointsTotal: number;
  totalMedals: number;
}

export interface SportContext {
  sport: string;
  gender: Gender;
}

/** Event context for a page that covers exactly one event */
export interface EventContext extends SportContext {
  eventName: string;
}

export type ProgressCallback = (message: string) => void;

export type JsonEvent =
  | { type: "progress"; message: string }
  | { type: "complete"; data: unknown }
  | { type: "error"; message: string };
