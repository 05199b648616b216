import { describe, it } from "node:test";
import assert from "node:assert";
import { classifyDailyDoubles, matchesDescriptor, tallyMedals } from "./daily-double";
import type { DailyDoubleDescriptor, MedalRecord } from "./types";

function record(overrides: Partial<MedalRecord> = {}): MedalRecord {
  return {
    sport: "Alpine skiing",
    gender: "Men's",
    eventName: "Slalom",
    fullEventLabel: "Men's Alpine skiing: Slalom",
    athlete: "Loïc Example",
    medal: "gold",
    countryCode: "SUI",
    sourceUrl: "https://example.test/a",
    ...overrides,
  };
}

function descriptor(
  name: string,
  fields: Partial<Omit<DailyDoubleDescriptor, "name">> = {},
): DailyDoubleDescriptor {
  return { name, requiredKeywords: [], excludedKeywords: [], exactMatch: [], ...fields };
}

describe("matchesDescriptor", () => {
  const slalom = descriptor("Men's Alpine Slalom", { exactMatch: ["slalom"] });
  const skiCross = descriptor("Women's Ski Cross", {
    requiredKeywords: ["ski cross"],
    excludedKeywords: ["team"],
  });

  it("requires an exact event name when one is given", () => {
    assert.strictEqual(matchesDescriptor(record(), slalom), true);
    assert.strictEqual(matchesDescriptor(record({ eventName: "Men's slalom" }), slalom), true);
    assert.strictEqual(matchesDescriptor(record({ eventName: "Giant slalom" }), slalom), false);
  });

  it("applies required and excluded keywords", () => {
    assert.strictEqual(matchesDescriptor(record({ eventName: "Ski cross" }), skiCross), true);
    assert.strictEqual(matchesDescriptor(record({ eventName: "Team ski cross" }), skiCross), false);
  });

  it("restricts by sport and gender", () => {
    const restricted = descriptor("Slalom", {
      sport: "Alpine skiing",
      gender: "Men's",
      exactMatch: ["slalom"],
    });
    assert.strictEqual(matchesDescriptor(record({ sport: "Alpine Skiing" }), restricted), true);
    assert.strictEqual(matchesDescriptor(record({ sport: "Freestyle skiing" }), restricted), false);
    assert.strictEqual(matchesDescriptor(record({ gender: "Women's" }), restricted), false);
  });
});

describe("classifyDailyDoubles", () => {
  it("assigns each record to the first matching descriptor", () => {
    const descriptors = [
      descriptor("Slalom A", { exactMatch: ["slalom"] }),
      descriptor("Slalom B", { requiredKeywords: ["slalom"] }),
      descriptor("Ski cross", { requiredKeywords: ["ski cross"] }),
    ];
    const result = classifyDailyDoubles(
      [
        record(),
        record({ athlete: "Daniel Example" }),
        record({ medal: "silver", countryCode: "AUT", athlete: "Marco Example" }),
        record({ eventName: "Giant slalom", countryCode: "NOR", athlete: "Henrik Example" }),
      ],
      descriptors,
    );

    const summary = Array.from(result, ([name, records]) => [
      name,
      records.map((r) => `${r.medal} ${r.countryCode} ${r.eventName}`),
    ]);
    assert.deepStrictEqual(summary, [
      ["Slalom A", ["gold SUI Slalom", "silver AUT Slalom"]],
      ["Slalom B", ["gold NOR Giant slalom"]],
      ["Ski cross", []],
    ]);
  });
});

describe("tallyMedals", () => {
  it("counts medals per country", () => {
    const tally = tallyMedals([
      record(),
      record({ medal: "silver" }),
      record({ medal: "bronze", countryCode: "AUT" }),
    ]);
    assert.deepStrictEqual(tally.get("SUI"), { gold: 1, silver: 1, bronze: 0, total: 2 });
    assert.deepStrictEqual(tally.get("AUT"), { gold: 0, silver: 0, bronze: 1, total: 1 });
  });
});
