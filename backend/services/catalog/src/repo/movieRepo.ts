// backend/services/catalog/src/repo/movieRepo.ts
/**
 * Purpose:
 * - Movie reads: paged list, faceted cast search, movie + comments join,
 *   and the small lookups (by country, genre list).
 *
 * Notes:
 * - Driver failures propagate untouched, except memory/size limit errors
 *   from the facet aggregation, which are re-signaled as FilterTooBroadError.
 */

import { MongoServerError, type Document } from "mongodb";
import { RepoBase, type RepoBaseConfig } from "@catalog/shared/base/RepoBase";
import type { DbClient } from "@catalog/shared/db/DbClient";
import { decodeObjectId } from "@catalog/shared/db/objectId";
import { toMongoSort } from "@catalog/shared/db/orderSpec";
import type { FilterIntent } from "../contracts/filter";
import type {
  FacetResult,
  MovieDocument,
  MovieTitle,
  MovieWithComments,
  Page,
} from "../contracts/movie";
import {
  FilterTooBroadError,
  PreconditionViolatedError,
  requirePaging,
} from "../errors";
import { toFacetResult, type FacetStageDoc } from "../mappers/facet.mapper";
import { compileFilter } from "../query/filterCompiler";
import {
  castMatchStages,
  countPipeline,
  facetPipeline,
} from "../pipelines/faceted.pipeline";
import { movieWithCommentsPipeline } from "../pipelines/movieComments.pipeline";
import { allGenresPipeline } from "../pipelines/catalog.pipelines";

// Server error codes for memory / size limits hit by sort, group or $facet
const RESOURCE_LIMIT_CODES: ReadonlySet<number> = new Set([
  146, // ExceededMemoryLimit
  292, // QueryExceededMemoryLimitNoDiskUseAllowed
  10334, // BSONObjectTooLarge
  16819, // sort exceeded memory limit
  16820, // sort exceeded memory limit, disk use disabled
  16945, // group exceeded memory limit
]);

export interface MovieRepoConfig extends Partial<RepoBaseConfig> {
  /** Collection joined by fetchWithComments. */
  commentsCollection?: string;
}

export class MovieRepo extends RepoBase<MovieDocument> {
  private readonly commentsCollection: string;

  constructor(db: DbClient, cfg: MovieRepoConfig = {}) {
    super(db, { ...cfg, collection: cfg.collection ?? "movies" });
    this.commentsCollection = cfg.commentsCollection ?? "comments";
  }

  /**
   * One page of movies for the intent. The exact total is only counted for
   * page 0; later pages leave `totalCount` unset.
   */
  public async fetchPage(
    intent: FilterIntent,
    page: number,
    pageSize: number
  ): Promise<Page> {
    requirePaging(page, pageSize);
    const spec = compileFilter(intent);
    const col = await this.coll();

    const cursor = col
      .find(
        spec.predicate,
        spec.projection ? { projection: spec.projection } : undefined
      )
      .sort(toMongoSort(spec.order))
      .skip(page * pageSize)
      .limit(pageSize);

    if (page > 0) {
      return { movies: await cursor.toArray() };
    }

    const [movies, totalCount] = await Promise.all([
      cursor.toArray(),
      col.countDocuments(spec.predicate),
    ]);
    this.log.debug({ intent: intent.kind, totalCount }, "first page counted");
    return { movies, totalCount };
  }

  /**
   * Page of movies for a cast filter, plus runtime/rating histograms and the
   * exact match count. An empty cast list is a caller bug.
   */
  public async fetchFaceted(
    castNames: readonly string[],
    page: number,
    pageSize: number
  ): Promise<FacetResult> {
    const names = [
      ...new Set(castNames.map((n) => n.trim()).filter((n) => n.length > 0)),
    ];
    if (names.length === 0) {
      throw new PreconditionViolatedError(
        "No filters to pass to faceted search"
      );
    }
    requirePaging(page, pageSize);

    const base = castMatchStages(names);
    const col = await this.coll();

    const [facet, count] = await Promise.all([
      col
        .aggregate<FacetStageDoc>(facetPipeline(base, page, pageSize), {
          allowDiskUse: true,
        })
        .next(),
      col
        .aggregate<{ count: number }>(countPipeline(base), {
          allowDiskUse: true,
        })
        .next(),
    ]).catch((err: unknown) => {
      throw this.resignalFacetError(err, names.length);
    });

    return toFacetResult(facet, count);
  }

  private resignalFacetError(err: unknown, castCount: number): unknown {
    if (
      !(err instanceof MongoServerError) ||
      typeof err.code !== "number" ||
      !RESOURCE_LIMIT_CODES.has(err.code)
    ) {
      return err;
    }
    this.log.warn(
      { code: err.code, cast: castCount },
      "facet aggregation rejected by server"
    );
    return new FilterTooBroadError(err);
  }

  /**
   * The movie with its comments (newest first) under `comments`, or null
   * when the id is malformed or matches nothing.
   */
  public async fetchWithComments(
    id: string
  ): Promise<MovieWithComments | null> {
    const movieId = decodeObjectId(id);
    if (!movieId) return null;

    const col = await this.coll();
    return col
      .aggregate<MovieWithComments>(
        movieWithCommentsPipeline(movieId, this.commentsCollection)
      )
      .next();
  }

  public async moviesByCountry(
    countries: readonly string[]
  ): Promise<MovieTitle[]> {
    const col = await this.coll();
    const docs = await col
      .find(
        { countries: { $in: [...countries] } },
        { projection: { title: 1 } }
      )
      .toArray();
    return docs.map((d) => ({ _id: d._id, title: d.title }));
  }

  /** Distinct genres across the catalog, alphabetical. */
  public async allGenres(): Promise<string[]> {
    const col = await this.coll();
    const doc = await col
      .aggregate<{ genres: string[] } & Document>(allGenresPipeline())
      .next();
    return [...(doc?.genres ?? [])].sort((a, b) => a.localeCompare(b));
  }
}
