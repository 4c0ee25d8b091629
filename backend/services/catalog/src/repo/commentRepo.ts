// backend/services/catalog/src/repo/commentRepo.ts
/**
 * Purpose:
 * - Commenter ranking, plus the comment writes the joined movie view reads
 *   back. Writes match on the author's email so a user only touches their
 *   own comments.
 */

import { ObjectId } from "mongodb";
import { RepoBase, type RepoBaseConfig } from "@catalog/shared/base/RepoBase";
import type { DbClient } from "@catalog/shared/db/DbClient";
import { decodeObjectId } from "@catalog/shared/db/objectId";
import type { CommentDocument, CommenterCount } from "../contracts/movie";
import { PreconditionViolatedError } from "../errors";
import {
  TOP_COMMENTERS_DEFAULT_LIMIT,
  topCommentersPipeline,
} from "../pipelines/catalog.pipelines";

export type NewComment = {
  movieId: string;
  name: string;
  email: string;
  text: string;
  date: Date;
};

export type CommentUpdate = { matched: number; modified: number };

export class CommentRepo extends RepoBase<CommentDocument> {
  constructor(db: DbClient, cfg: Partial<RepoBaseConfig> = {}) {
    super(db, { ...cfg, collection: cfg.collection ?? "comments" });
  }

  /**
   * Most frequent commenters by email. Read with majority read concern so
   * recent comment activity is neither under- nor over-counted.
   */
  public async topCommenters(
    limit: number = TOP_COMMENTERS_DEFAULT_LIMIT
  ): Promise<CommenterCount[]> {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new PreconditionViolatedError(
        `limit must be an integer > 0, got ${limit}`
      );
    }
    const col = await this.coll();
    const rows = await col
      .aggregate<{ _id: string; count: number }>(topCommentersPipeline(limit), {
        readConcern: { level: "majority" },
      })
      .toArray();
    return rows.map((r) => ({ email: r._id, count: r.count }));
  }

  /** Returns the new comment's id, or null when movieId is malformed. */
  public async addComment(input: NewComment): Promise<ObjectId | null> {
    const movieId = decodeObjectId(input.movieId);
    if (!movieId) return null;

    const col = await this.coll();
    const doc: CommentDocument = {
      _id: new ObjectId(),
      movie_id: movieId,
      name: input.name,
      email: input.email,
      text: input.text,
      date: input.date,
    };
    const res = await col.insertOne(doc);
    return res.insertedId;
  }

  public async updateComment(
    commentId: string,
    email: string,
    text: string,
    date: Date
  ): Promise<CommentUpdate> {
    const id = decodeObjectId(commentId);
    if (!id) return { matched: 0, modified: 0 };

    const col = await this.coll();
    const res = await col.updateOne(
      { _id: id, email },
      { $set: { text, date } }
    );
    return { matched: res.matchedCount, modified: res.modifiedCount };
  }

  public async deleteComment(
    commentId: string,
    email: string
  ): Promise<{ deleted: number }> {
    const id = decodeObjectId(commentId);
    if (!id) return { deleted: 0 };

    const col = await this.coll();
    const res = await col.deleteOne({ _id: id, email });
    return { deleted: res.deletedCount };
  }
}
