import { describe, it } from "node:test";
import assert from "node:assert";
import type { MedalRecord } from "../types";
import { validateEventCoverage } from "./validate";

function record(overrides: Partial<MedalRecord>): MedalRecord {
  return {
    sport: "Biathlon",
    gender: "Men's",
    eventName: "Relay",
    fullEventLabel: "Men's Biathlon: Relay",
    athlete: "",
    medal: "gold",
    countryCode: "NOR",
    sourceUrl: "https://wiki.test/winners",
    ...overrides,
  };
}

describe("validateEventCoverage", () => {
  const summary = validateEventCoverage(
    [
      { countryCode: "NOR", countryName: "Norway", gold: 2, silver: 0, bronze: 0, total: 2 },
      { countryCode: "SUI", countryName: "Switzerland", gold: 1, silver: 0, bronze: 0, total: 1 },
    ],
    new Map([
      [
        "NOR",
        [
          record({ athlete: "Johannes Example" }),
          record({ athlete: "Sturla Example" }),
          record({ eventName: "Sprint", athlete: "Johannes Example" }),
        ],
      ],
      ["ITA", [record({ countryCode: "ITA", medal: "bronze" })]],
    ]),
  );

  it("counts a team medal once per country", () => {
    assert.ok(!summary.allWarnings.some((warning) => warning.countryCode === "NOR"));
  });

  it("flags countries whose events disagree with the medal table", () => {
    assert.deepStrictEqual(
      summary.allWarnings.map((warning) => [warning.rule, warning.message]),
      [
        ["medal_count", "SUI: events disagree with medal table (gold 0/1)"],
        ["missing_totals", "ITA: 1 event medals but no medal table row"],
      ],
    );
  });

  it("summarizes warnings by rule", () => {
    assert.strictEqual(summary.totalCountries, 3);
    assert.strictEqual(summary.countriesWithWarnings, 2);
    assert.deepStrictEqual(summary.warningsByRule, { medal_count: 1, missing_totals: 1 });
  });
});
