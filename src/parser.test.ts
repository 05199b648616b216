import { describe, it } from "node:test";
import assert from "node:assert";
import { createCountryResolver } from "./countries";
import { ParseError } from "./errors";
import {
  buildEventLabel,
  cleanEventName,
  extractEventResults,
  extractRecords,
  inferGender,
  parseCountryCode,
  parseMedalTotals,
  parseMedalsPayload,
} from "./parser";
import { createTable } from "./table";
import type { SportContext } from "./types";

const resolver = createCountryResolver({
  norway: "NOR",
  sweden: "SWE",
  switzerland: "SUI",
  italy: "ITA",
  germany: "GER",
});

const sourceUrl = "https://example.test/medal-winners";

function collect() {
  const messages: string[] = [];
  return { messages, onProgress: (msg: string) => messages.push(msg) };
}

describe("extractRecords", () => {
  it("extracts medal cells from event tables only", () => {
    const tables = [
      createTable(["Rank", "Nation", "Total"], [["1", "Norway", "5"]], { index: 0 }),
      createTable(
        ["Event", "Gold", "Silver", "Bronze"],
        [["Downhill details", "Franjo von Allmen Switzerland", "", "—"]],
        { index: 2 },
      ),
    ];
    const sportMapping = new Map<number, SportContext>([
      [2, { sport: "Alpine skiing", gender: "Men's" }],
    ]);

    assert.deepStrictEqual(extractRecords(tables, { resolver, sportMapping, sourceUrl }), [
      {
        sport: "Alpine skiing",
        gender: "Men's",
        eventName: "Downhill",
        fullEventLabel: "Men's Alpine skiing: Downhill",
        athlete: "Franjo von Allmen",
        medal: "gold",
        countryCode: "SUI",
        sourceUrl,
      },
    ]);
  });

  it("skips an event table without a gold column", () => {
    const table = createTable(
      ["Event", "Winner", "Runner-up"],
      [["Singles", "Anna Example Italy", "Berta Example Germany"]],
      { section: "Luge" },
    );
    assert.deepStrictEqual(extractRecords([table], { resolver, sourceUrl }), []);
  });

  it("infers gender per row and carries it forward", () => {
    const table = createTable(
      ["Event", "Gold", "Silver", "Bronze"],
      [
        ["Men's sprint", "Johannes Example Norway", "", ""],
        ["Pursuit", "Sturla Example Norway", "", ""],
        ["Women's sprint", "Anna Example Sweden", "", ""],
        ["Mixed relay", "Norway Team members", "", ""],
        ["Individual", "Marte Example Norway", "", ""],
      ],
      { section: "Biathlon" },
    );

    const records = extractRecords([table], { resolver, sourceUrl });
    assert.deepStrictEqual(
      records.map((r) => [r.gender, r.fullEventLabel, r.athlete]),
      [
        ["Men's", "Biathlon: Men's sprint", "Johannes Example"],
        ["Men's", "Men's Biathlon: Pursuit", "Sturla Example"],
        ["Women's", "Biathlon: Women's sprint", "Anna Example"],
        ["", "Biathlon: Mixed relay", ""],
        ["Women's", "Women's Biathlon: Individual", "Marte Example"],
      ],
    );
  });

  it("skips tables without a sport", () => {
    const { messages, onProgress } = collect();
    const table = createTable(
      ["Event", "Gold"],
      [["Singles", "Anna Example Italy"]],
      { index: 4 },
    );

    assert.deepStrictEqual(extractRecords([table], { resolver, sourceUrl, onProgress }), []);
    assert.deepStrictEqual(messages, ["Warning: No sport found for table 4, skipped"]);
  });

  it("counts cells whose country is unknown", () => {
    const { messages, onProgress } = collect();
    const table = createTable(
      ["Event", "Gold", "Silver", "Bronze"],
      [["Singles", "Someone Atlantis", "Other Example Norway", ""]],
      { section: "Luge" },
    );

    const records = extractRecords([table], { resolver, sourceUrl, onProgress });
    assert.deepStrictEqual(
      records.map((r) => `${r.medal} ${r.countryCode}`),
      ["silver NOR"],
    );
    assert.deepStrictEqual(messages, [
      "Warning: 1 medal cells without a known country in Luge (table 0)",
    ]);
  });
});

describe("event labels", () => {
  it("prefixes the gender unless the event names it", () => {
    assert.strictEqual(buildEventLabel("Alpine skiing", "Men's", "Slalom"), "Men's Alpine skiing: Slalom");
    assert.strictEqual(buildEventLabel("Alpine skiing", "Men's", "Men's slalom"), "Alpine skiing: Men's slalom");
    assert.strictEqual(buildEventLabel("Biathlon", "Women's", "Sprint"), "Women's Biathlon: Sprint");
    assert.strictEqual(buildEventLabel("Bobsleigh", "", "Two-man"), "Bobsleigh: Two-man");
  });

  it("cleans event names", () => {
    assert.strictEqual(cleanEventName("Slalom details[a]"), "Slalom");
    assert.strictEqual(cleanEventName("Giant slalomdetails"), "Giant slalom");
  });

  it("infers gender cues", () => {
    assert.strictEqual(inferGender("Ladies' singles"), "Women's");
    assert.strictEqual(inferGender("Men's 1500 m"), "Men's");
    assert.strictEqual(inferGender("Team event"), "");
    assert.strictEqual(inferGender("Two-man"), null);
  });
});

describe("parseCountryCode", () => {
  it("reads bare codes, codes in parentheses and names", () => {
    assert.strictEqual(parseCountryCode("NOR", resolver), "NOR");
    assert.strictEqual(parseCountryCode("Italy (ITA)*", resolver), "ITA");
    assert.strictEqual(parseCountryCode("Norway[a]", resolver), "NOR");
    assert.strictEqual(parseCountryCode("Atlantis", resolver), null);
    assert.strictEqual(parseCountryCode("", resolver), null);
  });
});

describe("extractEventResults", () => {
  it("reads the podium of a single-event page", () => {
    const { messages, onProgress } = collect();
    const tables = [
      createTable(["Rank", "Name", "Nation", "Time"], [["1", "Anna Example", "Italy", "1:00.00"]]),
      createTable(
        ["Medal", "Athlete", "NOC", "Time"],
        [
          ["Gold medal", "Anna Example[a]", "ITA", "1:00.00"],
          ["Silver", "Berta Example", "Germany (GER)", "1:00.10"],
          ["Bronze", "Cara Example", "Atlantis", "1:00.20"],
          ["", "Dora Example", "NOR", "1:00.30"],
        ],
      ),
    ];

    const records = extractEventResults(
      tables,
      { sport: "Luge", gender: "Women's", eventName: "Singles" },
      { resolver, sourceUrl, onProgress },
    );

    assert.deepStrictEqual(
      records.map((r) => [r.medal, r.countryCode, r.athlete, r.fullEventLabel]),
      [
        ["gold", "ITA", "Anna Example", "Women's Luge: Singles"],
        ["silver", "GER", "Berta Example", "Women's Luge: Singles"],
      ],
    );
    assert.deepStrictEqual(messages, [
      "Warning: 1 podium rows without a known country in Women's Luge: Singles",
    ]);
  });
});

describe("parseMedalTotals", () => {
  it("parses per-country totals", () => {
    const { messages, onProgress } = collect();
    const table = createTable(
      ["Rank", "NOC", "Gold", "Silver", "Bronze", "Total"],
      [
        ["1", "Norway (NOR)", "5", "3", "2", "10"],
        ["2", "Italy (ITA)*", "3", "4[a]", "1", "8"],
        ["3", "Atlantis", "1", "0", "0", "1"],
        ["4", "Sweden", "0", "1", "0", ""],
        ["Totals (3 entries)", "", "8", "8", "3", "19"],
      ],
    );

    assert.deepStrictEqual(parseMedalTotals([table], resolver, { onProgress }), [
      { countryCode: "NOR", countryName: "Norway", gold: 5, silver: 3, bronze: 2, total: 10 },
      { countryCode: "ITA", countryName: "Italy", gold: 3, silver: 4, bronze: 1, total: 8 },
      { countryCode: "SWE", countryName: "Sweden", gold: 0, silver: 1, bronze: 0, total: 1 },
    ]);
    assert.deepStrictEqual(messages, ["Warning: 1 medal table rows without a known country"]);
  });

  it("fails without a medal table", () => {
    assert.throws(
      () => parseMedalTotals([createTable(["Event", "Gold"], [])], resolver, { source: "src" }),
      { name: "ParseError", message: "Medal table not found (src)" },
    );
  });

  it("fails without a country column", () => {
    const table = createTable(["Rank", "Gold", "Silver", "Bronze"], [["1", "1", "0", "0"]]);
    assert.throws(() => parseMedalTotals([table], resolver, { source: "src" }), {
      name: "ParseError",
      message: "NOC column not found (src)",
    });
  });
});

describe("parseMedalsPayload", () => {
  it("finds medal rows nested in a JSON feed", () => {
    const body = JSON.stringify({
      data: {
        medalStandings: [
          { organisation: "NOR", description: "Norway", gold: 5, silver: "3", bronze: 2 },
        ],
      },
    });

    const table = parseMedalsPayload(body);
    assert.deepStrictEqual(table.headers, ["noc", "country", "gold", "silver", "bronze", "total"]);
    assert.deepStrictEqual(table.rows, [["NOR", "Norway", "5", "3", "2", "10"]]);
    assert.deepStrictEqual(parseMedalTotals([table], resolver), [
      { countryCode: "NOR", countryName: "Norway", gold: 5, silver: 3, bronze: 2, total: 10 },
    ]);
  });

  it("reads data embedded in __NEXT_DATA__", () => {
    const data = {
      props: {
        pageProps: {
          medals: [
            { noc: "ITA", country: "Italy", medals: { gold: 2, silver: 1, bronze: 0, total: 3 } },
          ],
        },
      },
    };
    const html = `<html><body><script id="__NEXT_DATA__" type="application/json">${JSON.stringify(data)}</script></body></html>`;

    assert.deepStrictEqual(parseMedalsPayload(html).rows, [["ITA", "Italy", "2", "1", "0", "3"]]);
  });

  it("rejects payloads without medal rows", () => {
    assert.throws(() => parseMedalsPayload("{not json", "src"), (error: unknown) => {
      assert.ok(error instanceof ParseError);
      assert.strictEqual(error.message, "Invalid medal JSON (src)");
      return true;
    });
    assert.throws(() => parseMedalsPayload('{"items":[]}', "src"), {
      name: "ParseError",
      message: "No medal rows found in payload (src)",
    });
  });
});
