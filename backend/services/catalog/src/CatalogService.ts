// backend/services/catalog/src/CatalogService.ts
/**
 * Purpose:
 * - Public operation boundary of the catalog query layer.
 * - Every operation resolves to a CatalogResult: values on success,
 *   FilterTooBroadError / StoreFailureError on failure.
 *
 * Notes:
 * - PreconditionViolatedError is rethrown as-is; it signals a caller bug and
 *   is never softened into a result.
 * - Nothing is retried here. Reads are idempotent; callers may re-issue them.
 */

import type { ObjectId } from "mongodb";
import { z } from "zod";
import type { DbClient } from "@catalog/shared/db/DbClient";
import { fail, ok } from "@catalog/shared/result";
import { getLogger, type Logger } from "@catalog/shared/utils/logger";
import type { FilterIntent } from "./contracts/filter";
import type {
  CommenterCount,
  ConnectionDescription,
  FacetResult,
  MovieTitle,
  MovieWithComments,
  Page,
} from "./contracts/movie";
import {
  FilterTooBroadError,
  PreconditionViolatedError,
  StoreFailureError,
  type CatalogResult,
} from "./errors";
import {
  CommentRepo,
  type CommentUpdate,
  type NewComment,
} from "./repo/commentRepo";
import { MovieRepo } from "./repo/movieRepo";

export type CollectionNames = { movies: string; comments: string };

export const DEFAULT_COLLECTIONS: CollectionNames = {
  movies: "movies",
  comments: "comments",
};

const zConnectionStatus = z.object({
  authInfo: z
    .object({
      authenticatedUserRoles: z
        .array(z.object({ role: z.string(), db: z.string() }))
        .optional(),
    })
    .optional(),
});

export class CatalogService {
  private readonly log: Logger;

  constructor(
    private readonly db: DbClient,
    private readonly movies: MovieRepo,
    private readonly comments: CommentRepo,
    logger: Logger = getLogger()
  ) {
    this.log = logger.child({ component: "CatalogService" });
  }

  static create(
    db: DbClient,
    opts: { collections?: Partial<CollectionNames>; logger?: Logger } = {}
  ): CatalogService {
    const names = { ...DEFAULT_COLLECTIONS, ...opts.collections };
    const logger = opts.logger ?? getLogger();
    return new CatalogService(
      db,
      new MovieRepo(db, {
        collection: names.movies,
        commentsCollection: names.comments,
        logger,
      }),
      new CommentRepo(db, { collection: names.comments, logger }),
      logger
    );
  }

  public fetchMovies(
    intent: FilterIntent,
    page: number,
    pageSize: number
  ): Promise<CatalogResult<Page>> {
    return this.run("fetchMovies", () =>
      this.movies.fetchPage(intent, page, pageSize)
    );
  }

  public fetchFaceted(
    castNames: readonly string[],
    page: number,
    pageSize: number
  ): Promise<CatalogResult<FacetResult>> {
    return this.run("fetchFaceted", () =>
      this.movies.fetchFaceted(castNames, page, pageSize)
    );
  }

  /** `value: null` means no such movie (malformed id or no match). */
  public fetchWithComments(
    id: string
  ): Promise<CatalogResult<MovieWithComments | null>> {
    return this.run("fetchWithComments", () =>
      this.movies.fetchWithComments(id)
    );
  }

  public topCommenters(
    limit?: number
  ): Promise<CatalogResult<CommenterCount[]>> {
    return this.run("topCommenters", () => this.comments.topCommenters(limit));
  }

  public moviesByCountry(
    countries: readonly string[]
  ): Promise<CatalogResult<MovieTitle[]>> {
    return this.run("moviesByCountry", () =>
      this.movies.moviesByCountry(countries)
    );
  }

  public allGenres(): Promise<CatalogResult<string[]>> {
    return this.run("allGenres", () => this.movies.allGenres());
  }

  public addComment(
    input: NewComment
  ): Promise<CatalogResult<ObjectId | null>> {
    return this.run("addComment", () => this.comments.addComment(input));
  }

  public updateComment(
    commentId: string,
    email: string,
    text: string,
    date: Date
  ): Promise<CatalogResult<CommentUpdate>> {
    return this.run("updateComment", () =>
      this.comments.updateComment(commentId, email, text, date)
    );
  }

  public deleteComment(
    commentId: string,
    email: string
  ): Promise<CatalogResult<{ deleted: number }>> {
    return this.run("deleteComment", () =>
      this.comments.deleteComment(commentId, email)
    );
  }

  /** Pool size and write concern in use, plus the authenticated role. */
  public describeConnection(): Promise<CatalogResult<ConnectionDescription>> {
    return this.run("describeConnection", async () => {
      const raw = await this.db.runCommand({ connectionStatus: 1 });
      const status = zConnectionStatus.parse(raw);
      const settings = this.db.settings();
      return {
        maxPoolSize: settings.maxPoolSize,
        writeConcern: settings.writeConcern,
        role: status.authInfo?.authenticatedUserRoles?.[0] ?? null,
      };
    });
  }

  private async run<T>(
    op: string,
    fn: () => Promise<T>
  ): Promise<CatalogResult<T>> {
    try {
      return ok(await fn());
    } catch (err) {
      if (err instanceof PreconditionViolatedError) {
        this.log.error({ op, err: err.message }, "precondition violated");
        throw err;
      }
      const failure =
        err instanceof FilterTooBroadError || err instanceof StoreFailureError
          ? err
          : new StoreFailureError(op, err);
      this.log.warn(
        { op, code: failure.code, err: failure.message },
        "catalog operation failed"
      );
      return fail(failure);
    }
  }
}
