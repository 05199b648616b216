import { readFile } from "fs/promises";
import { fileURLToPath } from "url";
import { ConfigError, errorMessage } from "./errors";
import { isRecord } from "./parser";
import { DEFAULT_WEIGHTS, type ScoringRules } from "./scoring";
import {
  jsonMedalApi,
  perSportPage,
  wikipediaAggregatePage,
  type TableSource,
} from "./sources";
import type { DailyDoubleDescriptor, Gender, SportContext } from "./types";

export const DEFAULT_CONFIG_FILE = fileURLToPath(
  new URL("../config/default.json", import.meta.url),
);
export const DEFAULT_COUNTRIES_FILE = fileURLToPath(
  new URL("../data/countries.json", import.meta.url),
);

export interface PipelineConfig {
  /** Lowercase country name -> NOC */
  readonly countries: Readonly<Record<string, string>>;
  readonly sportMapping: ReadonlyMap<number, SportContext>;
  readonly dailyDoubles: readonly DailyDoubleDescriptor[];
  readonly scoring: ScoringRules;
  readonly totalsSources: readonly TableSource[];
  readonly eventSources: readonly TableSource[];
  readonly timeoutMs: number;
  readonly delayMs: number;
}

const GENDERS: readonly Gender[] = ["Men's", "Women's", "Mixed", ""];

export async function loadConfig(
  options: {
    configFile?: string;
    countriesFile?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): Promise<PipelineConfig> {
  const {
    configFile = DEFAULT_CONFIG_FILE,
    countriesFile = DEFAULT_COUNTRIES_FILE,
    env = process.env,
  } = options;

  const [raw, countries] = await Promise.all([
    readJson(configFile),
    readJson(countriesFile),
  ]);
  return parseConfig(raw, countries, env);
}

async function readJson(path: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Cannot load ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Validate raw configuration values into a frozen PipelineConfig.
 * MEDALS_API_URLS (comma separated) adds JSON medal feeds as totals sources.
 */
export function parseConfig(
  raw: unknown,
  countries: unknown,
  env: NodeJS.ProcessEnv = {},
): PipelineConfig {
  const root = expectRecord(raw, "config");

  const totalsSources = expectArray(root.totalsSources, "totalsSources").map(
    (value, index) => parseSource(value, `totalsSources[${index}]`),
  );
  for (const url of (env.MEDALS_API_URLS || "").split(",")) {
    if (url.trim()) totalsSources.push(jsonMedalApi(url.trim()));
  }

  const eventSources = expectArray(root.eventSources, "eventSources").map(
    (value, index) => {
      const source = parseSource(value, `eventSources[${index}]`);
      if (source.kind === "json-api") {
        throw new ConfigError(
          `eventSources[${index}]: json-api sources only carry medal totals`,
        );
      }
      return source;
    },
  );

  const config: PipelineConfig = {
    countries: Object.freeze(parseCountries(countries)),
    sportMapping: parseSportMapping(root.sportMapping ?? {}),
    dailyDoubles: expectArray(root.dailyDoubles ?? [], "dailyDoubles").map(
      (value, index) => parseDescriptor(value, `dailyDoubles[${index}]`),
    ),
    scoring: parseScoring(root.scoring ?? {}),
    totalsSources,
    eventSources,
    timeoutMs: optionalNumber(root.timeoutMs, "timeoutMs") ?? 20_000,
    delayMs: optionalNumber(root.delayMs, "delayMs") ?? 1000,
  };

  return Object.freeze(config);
}

function parseCountries(value: unknown): Record<string, string> {
  const record = expectRecord(value, "countries");
  const countries: Record<string, string> = {};
  for (const [name, code] of Object.entries(record)) {
    const noc = expectString(code, `countries.${name}`).toUpperCase();
    if (!/^[A-Z]{3}$/.test(noc)) {
      throw new ConfigError(`countries.${name}: "${noc}" is not a 3-letter code`);
    }
    countries[name.toLowerCase()] = noc;
  }
  return countries;
}

function parseSource(value: unknown, path: string): TableSource {
  const record = expectRecord(value, path);
  const kind = expectString(record.kind, `${path}.kind`);
  const url = expectString(record.url, `${path}.url`);

  switch (kind) {
    case "wikipedia":
      return wikipediaAggregatePage(url);
    case "json-api":
      return jsonMedalApi(url);
    case "per-sport":
      return perSportPage(url, {
        sport: expectString(record.sport, `${path}.sport`),
        gender: parseGender(record.gender ?? "", `${path}.gender`),
        eventName: expectString(record.event, `${path}.event`),
      });
    default:
      throw new ConfigError(`${path}.kind: unknown source kind "${kind}"`);
  }
}

function parseSportMapping(value: unknown): Map<number, SportContext> {
  const record = expectRecord(value, "sportMapping");
  const mapping = new Map<number, SportContext>();
  for (const [key, entry] of Object.entries(record)) {
    const path = `sportMapping.${key}`;
    const index = Number(key);
    if (!Number.isInteger(index) || index < 0) {
      throw new ConfigError(`${path}: table index must be a non-negative integer`);
    }
    const pair = expectArray(entry, path);
    mapping.set(index, {
      sport: expectString(pair[0], `${path}[0]`),
      gender: parseGender(pair[1] ?? "", `${path}[1]`),
    });
  }
  return mapping;
}

function parseDescriptor(value: unknown, path: string): DailyDoubleDescriptor {
  const record = expectRecord(value, path);
  const descriptor: DailyDoubleDescriptor = {
    name: expectString(record.name, `${path}.name`),
    requiredKeywords: stringList(record.requiredKeywords, `${path}.requiredKeywords`),
    excludedKeywords: stringList(record.excludedKeywords, `${path}.excludedKeywords`),
    exactMatch: stringList(record.exactMatch, `${path}.exactMatch`),
  };
  if (record.sport !== undefined) {
    descriptor.sport = expectString(record.sport, `${path}.sport`);
  }
  if (record.gender !== undefined) {
    descriptor.gender = parseGender(record.gender, `${path}.gender`);
  }
  return descriptor;
}

function parseScoring(value: unknown): ScoringRules {
  const record = expectRecord(value, "scoring");
  const weights = expectRecord(record.weights ?? {}, "scoring.weights");
  const multipliers = expectRecord(record.multipliers ?? {}, "scoring.multipliers");

  const parsedMultipliers: Record<string, number> = {};
  for (const [code, factor] of Object.entries(multipliers)) {
    const parsed = optionalNumber(factor, `scoring.multipliers.${code}`);
    if (parsed !== undefined) parsedMultipliers[code.toUpperCase()] = parsed;
  }

  return {
    weights: {
      gold: optionalNumber(weights.gold, "scoring.weights.gold") ?? DEFAULT_WEIGHTS.gold,
      silver:
        optionalNumber(weights.silver, "scoring.weights.silver") ??
        DEFAULT_WEIGHTS.silver,
      bronze:
        optionalNumber(weights.bronze, "scoring.weights.bronze") ??
        DEFAULT_WEIGHTS.bronze,
    },
    multipliers: parsedMultipliers,
  };
}

function parseGender(value: unknown, path: string): Gender {
  const gender = GENDERS.find((candidate) => candidate === value);
  if (gender === undefined) {
    throw new ConfigError(
      `${path}: expected one of ${GENDERS.map((g) => JSON.stringify(g)).join(", ")}`,
    );
  }
  return gender;
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigError(`${path}: expected an object`);
  }
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${path}: expected an array`);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new ConfigError(`${path}: expected a non-empty string`);
  }
  return value.trim();
}

function optionalNumber(value: unknown, path: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${path}: expected a non-negative number`);
  }
  return value;
}

function stringList(value: unknown, path: string): string[] {
  if (value === undefined) return [];
  return expectArray(value, path).map((item, index) =>
    expectString(item, `${path}[${index}]`),
  );
}
