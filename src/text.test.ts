import { describe, it } from "node:test";
import assert from "node:assert";
import {
  canonicalWithOffsets,
  canonicalize,
  normalize,
  stripFootnoteMarkers,
} from "./text";

describe("normalize", () => {
  it("collapses whitespace runs and trims", () => {
    assert.strictEqual(normalize("  Ski \n cross\t "), "Ski cross");
  });

  it("is idempotent", () => {
    for (const text of ["  Ski \n cross\t ", "Women's\u00a0 singles", "", "Slalom"]) {
      assert.strictEqual(normalize(normalize(text)), normalize(text));
    }
  });
});

describe("stripFootnoteMarkers", () => {
  it("removes bracketed annotations", () => {
    assert.strictEqual(stripFootnoteMarkers("Slalom[a][12] details"), "Slalom details");
  });
});

describe("canonicalize", () => {
  it("keeps lowercase letters and digits only", () => {
    assert.strictEqual(canonicalize("Men's  Slalom[a]"), "mensslalom");
    assert.strictEqual(canonicalize("1500 m"), "1500m");
  });

  it("keeps non-ASCII letters", () => {
    assert.strictEqual(canonicalize("Zürich"), "zürich");
  });

  it("is idempotent", () => {
    for (const text of ["Women's ski cross[b]", "  Ski-Cross ", "Große Schanze"]) {
      assert.strictEqual(canonicalize(canonicalize(text)), canonicalize(text));
    }
  });
});

describe("canonicalWithOffsets", () => {
  it("maps canonical characters back to the source text", () => {
    assert.deepStrictEqual(canonicalWithOffsets("A-b c"), {
      canonical: "abc",
      offsets: [0, 2, 4],
    });
  });
});
