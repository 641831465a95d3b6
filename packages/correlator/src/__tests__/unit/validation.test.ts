import { CorrelationInputError } from "@sessionlink/errors";
import { describe, expect, it } from "vitest";
import { parseCorrelateInput, parsePlayerIdList } from "../../validation.js";

describe("parseCorrelateInput", () => {
  it("trims and de-duplicates player ids in first-seen order", () => {
    expect(parseCorrelateInput({ playerIds: [" 2", "1", "2 ", ""], windowDays: 30 })).toEqual({
      playerIds: ["2", "1"],
      windowDays: 30,
    });
  });

  it("keeps a valid concurrency", () => {
    expect(parseCorrelateInput({ playerIds: ["1"], windowDays: 7, concurrency: 2 }).concurrency).toBe(2);
  });

  it("names every failing field", () => {
    try {
      parseCorrelateInput({ playerIds: [], windowDays: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(CorrelationInputError);
      if (error instanceof CorrelationInputError) {
        expect(error.issues).toHaveLength(2);
        expect(error.issues[0]).toBe("playerIds: at least one player id is required");
        expect(error.issues[1]).toMatch(/^windowDays: /);
      }
    }
  });
});

describe("parsePlayerIdList", () => {
  it("splits a comma-separated list", () => {
    expect(parsePlayerIdList("123, 456,,789 ")).toEqual(["123", "456", "789"]);
  });

  it("returns nothing for a blank string", () => {
    expect(parsePlayerIdList("   ")).toEqual([]);
  });
});
