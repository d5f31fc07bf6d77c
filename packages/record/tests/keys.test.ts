import { describe, it, expect } from "vitest";
import { indexedKey, parseIndexedKey } from "../src/keys.js";

describe("indexedKey", () => {
  it("writes one, two and three digit indices", () => {
    expect(indexedKey("member_", 0)).toBe("member_0");
    expect(indexedKey("prop_", 12, "_state")).toBe("prop_12_state");
    expect(indexedKey("op_", 255, "_id")).toBe("op_255_id");
  });

  it("rejects indices outside 0-255", () => {
    expect(() => indexedKey("member_", 256)).toThrow(RangeError);
    expect(() => indexedKey("member_", -1)).toThrow(RangeError);
    expect(() => indexedKey("member_", 1.5)).toThrow(RangeError);
  });
});

describe("parseIndexedKey", () => {
  it("round-trips every index 0-255", () => {
    for (let i = 0; i <= 255; i++) {
      expect(parseIndexedKey(indexedKey("prop_", i, "_id"), "prop_", "_id")).toBe(i);
    }
  });

  it("rejects leading zeros", () => {
    expect(parseIndexedKey("member_07", "member_")).toBeUndefined();
    expect(parseIndexedKey("member_0", "member_")).toBe(0);
  });

  it("rejects other prefixes, suffixes and missing digits", () => {
    expect(parseIndexedKey("prop_1_for", "prop_", "_id")).toBeUndefined();
    expect(parseIndexedKey("op_1_id", "prop_", "_id")).toBeUndefined();
    expect(parseIndexedKey("prop__id", "prop_", "_id")).toBeUndefined();
    expect(parseIndexedKey("member_count", "member_")).toBeUndefined();
  });

  it("rejects indices above 255", () => {
    expect(parseIndexedKey("vote_256", "vote_")).toBeUndefined();
    expect(parseIndexedKey("vote_1000", "vote_")).toBeUndefined();
  });
});
