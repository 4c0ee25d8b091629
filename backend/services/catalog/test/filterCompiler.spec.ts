// backend/services/catalog/test/filterCompiler.spec.ts
import { describe, it, expect } from "vitest";
import { parseFilterIntent, NO_FILTER } from "../src/contracts/filter";
import {
  compileFilter,
  DEFAULT_ORDER,
  REVIEW_COUNT_FIELD,
} from "../src/query/filterCompiler";
import { toMongoSort } from "@catalog/shared/db/orderSpec";

describe("parseFilterIntent", () => {
  it("prefers text over cast and genres", () => {
    expect(
      parseFilterIntent({ text: "space", cast: ["Tom Hanks"], genres: ["Drama"] })
    ).toEqual({ kind: "text", query: "space" });
  });

  it("prefers cast over genres", () => {
    expect(
      parseFilterIntent({ cast: ["Tom Hanks"], genres: ["Drama"] })
    ).toEqual({ kind: "cast", names: ["Tom Hanks"] });
  });

  it("accepts a single name and trims / dedupes lists", () => {
    expect(parseFilterIntent({ genres: "Drama" })).toEqual({
      kind: "genres",
      names: ["Drama"],
    });
    expect(
      parseFilterIntent({ cast: [" Meryl Streep ", "Meryl Streep", ""] })
    ).toEqual({ kind: "cast", names: ["Meryl Streep"] });
  });

  it("skips blank or ill-typed keys and falls through to the next one", () => {
    expect(parseFilterIntent({ text: "   ", genres: ["Comedy"] })).toEqual({
      kind: "genres",
      names: ["Comedy"],
    });
    expect(parseFilterIntent({ text: 42, cast: ["Keanu Reeves"] })).toEqual({
      kind: "cast",
      names: ["Keanu Reeves"],
    });
    expect(parseFilterIntent({ cast: [] })).toEqual(NO_FILTER);
  });

  it("resolves unusable input to no filter", () => {
    expect(parseFilterIntent(undefined)).toEqual(NO_FILTER);
    expect(parseFilterIntent("drama")).toEqual(NO_FILTER);
    expect(parseFilterIntent({ director: "Nolan" })).toEqual(NO_FILTER);
  });
});

describe("compileFilter", () => {
  it("matches everything with the review-count sort when there is no filter", () => {
    const spec = compileFilter({ kind: "none" });
    expect(spec.predicate).toEqual({});
    expect(spec.projection).toBeUndefined();
    expect(toMongoSort(spec.order)).toEqual({
      [REVIEW_COUNT_FIELD]: -1,
      _id: 1,
    });
  });

  it("compiles cast and genre membership to $in", () => {
    expect(compileFilter({ kind: "cast", names: ["A", "B"] })).toEqual({
      predicate: { cast: { $in: ["A", "B"] } },
      order: DEFAULT_ORDER,
    });
    expect(compileFilter({ kind: "genres", names: ["Drama"] })).toEqual({
      predicate: { genres: { $in: ["Drama"] } },
      order: DEFAULT_ORDER,
    });
  });

  it("sorts text search by the projected text score", () => {
    const spec = compileFilter({ kind: "text", query: "love story" });
    expect(spec.predicate).toEqual({ $text: { $search: "love story" } });
    expect(spec.projection).toEqual({ score: { $meta: "textScore" } });
    expect(toMongoSort(spec.order)).toEqual({
      score: { $meta: "textScore" },
      _id: 1,
    });
  });
});
