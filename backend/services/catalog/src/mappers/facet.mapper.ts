// backend/services/catalog/src/mappers/facet.mapper.ts
import { z } from "zod";
import type {
  FacetResult,
  MovieDocument,
  RangeBucket,
} from "../contracts/movie";
import {
  OTHER_BUCKET,
  RATING_BOUNDARIES,
  RUNTIME_BOUNDARIES,
} from "../pipelines/faceted.pipeline";

// `$bucket` emits the lower boundary (or the default label) as `_id`
const zBucket = z.object({
  _id: z.union([z.number(), z.literal(OTHER_BUCKET)]),
  count: z.number().int().nonnegative(),
});

const zBuckets = z.array(zBucket);

/** Raw `$facet` output document. */
export type FacetStageDoc = {
  runtime: unknown;
  rating: unknown;
  movies: MovieDocument[];
};

export function rangeLabel(lo: number, hi: number): string {
  return `${lo}-${hi}`;
}

/**
 * Expand sparse `$bucket` output into every range (in boundary order) plus
 * `other`, filling empty ranges with zero.
 */
export function toRangeBuckets(
  raw: unknown,
  boundaries: readonly number[]
): RangeBucket[] {
  const counts = new Map<number | string, number>();
  for (const b of zBuckets.parse(raw ?? [])) counts.set(b._id, b.count);

  const out: RangeBucket[] = [];
  for (let i = 0; i < boundaries.length - 1; i++) {
    const lo = boundaries[i];
    out.push({
      rangeLabel: rangeLabel(lo, boundaries[i + 1]),
      count: counts.get(lo) ?? 0,
    });
  }
  out.push({ rangeLabel: OTHER_BUCKET, count: counts.get(OTHER_BUCKET) ?? 0 });
  return out;
}

export function toFacetResult(
  facet: FacetStageDoc | null,
  count: { count: number } | null
): FacetResult {
  return {
    movies: facet?.movies ?? [],
    runtimeBuckets: toRangeBuckets(facet?.runtime, RUNTIME_BOUNDARIES),
    ratingBuckets: toRangeBuckets(facet?.rating, RATING_BOUNDARIES),
    // `$count` emits no document at all when nothing matched
    totalCount: count?.count ?? 0,
  };
}
