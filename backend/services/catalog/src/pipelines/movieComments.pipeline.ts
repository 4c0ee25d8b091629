// backend/services/catalog/src/pipelines/movieComments.pipeline.ts
import type { Document, ObjectId } from "mongodb";

/**
 * One movie with its comments embedded under `comments`, newest first.
 * The join is a correlated `$lookup` sub-pipeline (`let` + `$expr`), so the
 * match condition can grow beyond plain key equality.
 */
export function movieWithCommentsPipeline(
  movieId: ObjectId,
  commentsCollection: string
): Document[] {
  return [
    { $match: { _id: movieId } },
    {
      $lookup: {
        from: commentsCollection,
        let: { id: "$_id" },
        pipeline: [
          { $match: { $expr: { $eq: ["$movie_id", "$$id"] } } },
          { $sort: { date: -1 } },
        ],
        as: "comments",
      },
    },
  ];
}
