import { describe, it, expect } from "vitest";
import { compileKeys, isTaggedLookup, keyEquals, matchTypeOf } from "./keys.js";
import { Identifier } from "./identifier.js";
import { InvalidIdentifierError, describeValue } from "./errors.js";

const ID_TEXT = "123e4567-e89b-42d3-a456-426614174000";

describe("matchTypeOf", () => {
  it("should map primitives to their match type", () => {
    expect(matchTypeOf("a")).toBe("string");
    expect(matchTypeOf(1)).toBe("number");
    expect(matchTypeOf(1n)).toBe("bigint");
    expect(matchTypeOf(false)).toBe("boolean");
  });

  it("should recognize dates and identifiers", () => {
    expect(matchTypeOf(new Date(0))).toBe("date");
    expect(matchTypeOf(Identifier.from(ID_TEXT))).toBe("identifier");
  });

  it("should return undefined for other values", () => {
    expect(matchTypeOf(null)).toBeUndefined();
    expect(matchTypeOf(undefined)).toBeUndefined();
    expect(matchTypeOf({})).toBeUndefined();
    expect(matchTypeOf(new Set(["a"]))).toBeUndefined();
  });
});

describe("keyEquals", () => {
  it("should compare identifiers by value", () => {
    expect(keyEquals(Identifier.from(ID_TEXT), Identifier.from(ID_TEXT.toUpperCase()))).toBe(true);
    expect(keyEquals(Identifier.from(ID_TEXT), Identifier.generate())).toBe(false);
  });

  it("should compare dates by timestamp", () => {
    expect(keyEquals(new Date(1000), new Date(1000))).toBe(true);
    expect(keyEquals(new Date(1000), new Date(2000))).toBe(false);
  });

  it("should treat two invalid dates as equal", () => {
    expect(keyEquals(new Date(Number.NaN), new Date("not a date"))).toBe(true);
    expect(keyEquals(new Date(Number.NaN), new Date(0))).toBe(false);
  });

  it("should treat NaN as equal to itself", () => {
    expect(keyEquals(Number.NaN, Number.NaN)).toBe(true);
  });

  it("should compare other values strictly", () => {
    expect(keyEquals("1", 1)).toBe(false);
    expect(keyEquals(2n, 2n)).toBe(true);
    expect(keyEquals({}, {})).toBe(false);
  });
});

describe("isTaggedLookup", () => {
  it("should recognize tagged lookups only", () => {
    expect(isTaggedLookup({ key: "ids", value: "x" })).toBe(true);
    expect(isTaggedLookup("ids")).toBe(false);
    expect(isTaggedLookup(new Date(0))).toBe(false);
    expect(isTaggedLookup(Identifier.from(ID_TEXT))).toBe(false);
  });
});

describe("compileKeys", () => {
  it("should bind extractors and mark identifier keys as non-unique", () => {
    const [handles, ids] = compileKeys<{ handle: string; id: Identifier }>([
      { projectionName: "handles", sourceAttribute: "handle", matchType: "string" },
      { projectionName: "ids", sourceAttribute: "id", matchType: "identifier" },
    ]);
    const id = Identifier.from(ID_TEXT);

    expect(handles.unique).toBe(true);
    expect(ids.unique).toBe(false);
    expect(handles.extract({ handle: "neo", id })).toBe("neo");
    expect(ids.extract({ handle: "neo", id })).toBe(id);
  });
});

describe("Identifier", () => {
  it("should generate distinct v4 identifiers", () => {
    const a = Identifier.generate();
    const b = Identifier.generate();

    expect(a.equals(b)).toBe(false);
    expect(a.value).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("should normalize case", () => {
    const id = Identifier.from(ID_TEXT.toUpperCase());
    expect(id.toString()).toBe(ID_TEXT);
    expect(JSON.stringify({ id })).toBe(`{"id":"${ID_TEXT}"}`);
  });

  it("should reject malformed input", () => {
    expect(() => Identifier.from("not-a-uuid")).toThrow(InvalidIdentifierError);
    expect(() => Identifier.from("not-a-uuid")).toThrow('Invalid identifier: "not-a-uuid"');
  });
});

describe("describeValue", () => {
  it("should render key values and tagged lookups", () => {
    expect(describeValue("Alice")).toBe("Alice");
    expect(describeValue(12n)).toBe("12n");
    expect(describeValue(new Date("2026-01-02T03:04:05Z"))).toBe("2026-01-02T03:04:05.000Z");
    expect(describeValue(new Date(Number.NaN))).toBe("Invalid Date");
    expect(describeValue(Identifier.from(ID_TEXT))).toBe(ID_TEXT);
    expect(describeValue({ key: "ages", value: 30 })).toBe("ages=30");
  });
});
