// backend/services/catalog/src/pipelines/faceted.pipeline.ts
/**
 * Purpose:
 * - Stage builders for faceted cast search: one `$facet` fan-out (page +
 *   runtime histogram + rating histogram) and a separate `$count` over the
 *   same match.
 *
 * Notes:
 * - Paging (`$skip`/`$limit`) sits inside the `movies` branch, so the two
 *   histograms count the whole match set, not just the current page.
 * - `$bucket` drops values outside the boundaries (and missing/null values)
 *   into the `default` bucket.
 */

import type { Document } from "mongodb";
import { toMongoSort } from "@catalog/shared/db/orderSpec";
import { DEFAULT_ORDER } from "../query/filterCompiler";

export const RUNTIME_BOUNDARIES = [0, 60, 90, 120, 180] as const;
export const RATING_BOUNDARIES = [0, 50, 70, 90, 100] as const;
export const OTHER_BUCKET = "other";

function bucketStage(
  groupBy: string,
  boundaries: readonly number[]
): Document {
  return {
    $bucket: {
      groupBy,
      boundaries: [...boundaries],
      default: OTHER_BUCKET,
      output: { count: { $sum: 1 } },
    },
  };
}

/** `$match` on cast membership, sorted like the plain movie list. */
export function castMatchStages(castNames: readonly string[]): Document[] {
  return [
    { $match: { cast: { $in: [...castNames] } } },
    { $sort: toMongoSort(DEFAULT_ORDER) },
  ];
}

export function countPipeline(base: readonly Document[]): Document[] {
  return [...base, { $count: "count" }];
}

export function facetPipeline(
  base: readonly Document[],
  page: number,
  pageSize: number
): Document[] {
  return [
    ...base,
    {
      $facet: {
        runtime: [bucketStage("$runtime", RUNTIME_BOUNDARIES)],
        rating: [bucketStage("$metacritic", RATING_BOUNDARIES)],
        movies: [
          { $skip: page * pageSize },
          { $limit: pageSize },
          // identity restatement; keeps every branch a real sub-pipeline
          { $addFields: { title: "$title" } },
        ],
      },
    },
  ];
}
