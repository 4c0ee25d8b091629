// backend/services/catalog/src/pipelines/catalog.pipelines.ts
import type { Document } from "mongodb";

export const TOP_COMMENTERS_DEFAULT_LIMIT = 20;

/** Comment counts per author email, most active first. */
export function topCommentersPipeline(limit: number): Document[] {
  return [
    { $group: { _id: "$email", count: { $sum: 1 } } },
    // _id breaks ties so equal counts come back in a fixed order
    { $sort: { count: -1, _id: 1 } },
    { $limit: limit },
  ];
}

export function allGenresPipeline(): Document[] {
  return [
    { $unwind: "$genres" },
    { $group: { _id: null, genres: { $addToSet: "$genres" } } },
  ];
}
