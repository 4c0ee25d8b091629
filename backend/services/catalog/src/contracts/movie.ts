// backend/services/catalog/src/contracts/movie.ts
import type { Document, ObjectId } from "mongodb";

/**
 * Catalog record. Opaque apart from the fields the query layer reads.
 */
export interface MovieDocument extends Document {
  _id: ObjectId;
  title?: string;
  countries?: string[];
  cast?: string[];
  genres?: string[];
  runtime?: number | null;
  metacritic?: number | null;
  tomatoes?: { viewer?: { numReviews?: number } };
  /** Present only on text-search results. */
  score?: number;
}

export interface CommentDocument extends Document {
  _id: ObjectId;
  movie_id: ObjectId;
  name: string;
  email: string;
  text: string;
  date: Date;
}

/** Comments are joined at read time only; never stored on the movie. */
export type MovieWithComments = MovieDocument & { comments: CommentDocument[] };

export type MovieTitle = { _id: ObjectId; title?: string };

export type Page = {
  movies: MovieDocument[];
  /** Only computed for page 0; callers keep it for later pages. */
  totalCount?: number;
};

export type RangeBucket = { rangeLabel: string; count: number };

export type FacetResult = {
  movies: MovieDocument[];
  runtimeBuckets: RangeBucket[];
  ratingBuckets: RangeBucket[];
  totalCount: number;
};

export type CommenterCount = { email: string; count: number };

export type ConnectionDescription = {
  maxPoolSize: number;
  writeConcern: { w?: number | string; wtimeoutMS?: number };
  role: { role: string; db: string } | null;
};
