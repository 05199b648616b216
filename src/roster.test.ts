import { describe, it } from "node:test";
import assert from "node:assert";
import { join } from "path";
import { tmpdir } from "os";
import { escapeCsv, parseCsv } from "./csv";
import { ConfigError } from "./errors";
import { loadRoster, parseRoster } from "./roster";

describe("parseCsv", () => {
  it("reads quoted fields, doubled quotes and CRLF", () => {
    const parsed = parseCsv('a,b\r\n"x, y","say ""hi"""\n\n1,2');
    assert.deepStrictEqual(parsed.headers, ["a", "b"]);
    assert.deepStrictEqual(parsed.rows, [
      { a: "x, y", b: 'say "hi"' },
      { a: "1", b: "2" },
    ]);
  });

  it("strips a byte order mark", () => {
    assert.deepStrictEqual(parseCsv("\uFEFFfriend,noc_1\nAlex,NOR\n").headers, ["friend", "noc_1"]);
  });
});

describe("escapeCsv", () => {
  it("quotes values with separators or quotes", () => {
    assert.strictEqual(escapeCsv("plain"), "plain");
    assert.strictEqual(escapeCsv("Alex, Jr."), '"Alex, Jr."');
    assert.strictEqual(escapeCsv('say "hi"'), '"say ""hi"""');
  });
});

describe("parseRoster", () => {
  it("parses two picks per friend", () => {
    const roster = parseRoster(
      "friend,noc_1,country_1,noc_2,country_2\nAlex,nor,Norway,SUI,\nSam,ITA,,,\n",
    );
    assert.deepStrictEqual(roster, [
      {
        displayName: "Alex",
        countryCode1: "NOR",
        countryCode2: "SUI",
        countryName1: "Norway",
        countryName2: undefined,
      },
      {
        displayName: "Sam",
        countryCode1: "ITA",
        countryCode2: undefined,
        countryName1: undefined,
        countryName2: undefined,
      },
    ]);
  });

  it("accepts the single-country noc column", () => {
    assert.deepStrictEqual(parseRoster("friend,noc,country\nAlex,NOR,Norway\n"), [
      {
        displayName: "Alex",
        countryCode1: "NOR",
        countryCode2: undefined,
        countryName1: "Norway",
        countryName2: undefined,
      },
    ]);
  });

  it("matches headers case-insensitively", () => {
    const roster = parseRoster("Friend,NOC_1,NOC_2\nAlex,NOR,SUI\n");
    assert.strictEqual(roster[0].countryCode2, "SUI");
  });

  it("names the missing columns", () => {
    assert.throws(() => parseRoster("friend,country_1\nAlex,Norway\n"), {
      name: "ConfigError",
      message: "friends.csv missing columns: noc_1, noc_2",
    });
  });

  it("rejects a friend listed twice", () => {
    assert.throws(() => parseRoster("friend,noc_1,noc_2\nAlex,NOR,\nAlex,SUI,\n"), {
      name: "ConfigError",
      message: 'friends.csv lists "Alex" twice',
    });
  });
});

describe("loadRoster", () => {
  it("reports an unreadable file as a config error", async () => {
    const path = join(tmpdir(), "medal-draft-missing", "friends.csv");
    await assert.rejects(loadRoster(path), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.ok(error.message.startsWith(`Cannot read roster ${path}:`));
      return true;
    });
  });
});
