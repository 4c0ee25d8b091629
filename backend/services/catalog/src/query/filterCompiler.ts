// backend/services/catalog/src/query/filterCompiler.ts
/**
 * Purpose:
 * - Map a FilterIntent to the (predicate, order, projection) triple the movie
 *   reads execute.
 *
 * Notes:
 * - Pure and total; every intent compiles.
 * - `tomatoes.viewer.numReviews` only exists on a curated subset of titles.
 *   Sorting on it descending puts that subset first; documents without it
 *   sort last but are not excluded.
 * - Text search sorts on the `$meta` text score, so the projection must
 *   surface the same score field before the sort can use it.
 */

import type { Document, Filter } from "mongodb";
import { buildOrderSpec, type OrderSpec } from "@catalog/shared/db/orderSpec";
import type { FilterIntent } from "../contracts/filter";
import type { MovieDocument } from "../contracts/movie";

export const REVIEW_COUNT_FIELD = "tomatoes.viewer.numReviews";
export const TEXT_SCORE_FIELD = "score";

export const DEFAULT_ORDER: OrderSpec = buildOrderSpec([
  { field: REVIEW_COUNT_FIELD, dir: -1 },
]);

export const TEXT_SCORE_ORDER: OrderSpec = buildOrderSpec([
  { field: TEXT_SCORE_FIELD, meta: "textScore" },
]);

export interface QuerySpec {
  predicate: Filter<MovieDocument>;
  order: OrderSpec;
  projection?: Document;
}

export function compileFilter(intent: FilterIntent): QuerySpec {
  switch (intent.kind) {
    case "text":
      return {
        predicate: { $text: { $search: intent.query } },
        order: TEXT_SCORE_ORDER,
        projection: { [TEXT_SCORE_FIELD]: { $meta: "textScore" } },
      };
    case "cast":
      return {
        predicate: { cast: { $in: [...intent.names] } },
        order: DEFAULT_ORDER,
      };
    case "genres":
      return {
        predicate: { genres: { $in: [...intent.names] } },
        order: DEFAULT_ORDER,
      };
    case "none":
      return { predicate: {}, order: DEFAULT_ORDER };
  }
}
