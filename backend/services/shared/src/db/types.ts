// backend/services/shared/src/db/types.ts
/**
 * Purpose:
 * - Interfaces for DB client + factory so services depend on abstractions,
 *   and the narrow collection port repos read and write through.
 *
 * Notes:
 * - The `mongodb` driver's `Collection<T>` satisfies `StoreCollection<T>`
 *   structurally; tests supply in-process fakes of the same port.
 */

import type {
  AggregateOptions,
  DeleteResult,
  Document,
  Filter,
  FindOptions,
  InsertOneResult,
  OptionalUnlessRequiredId,
  Sort,
  UpdateFilter,
  UpdateResult,
  WithId,
} from "mongodb";

export interface IDbConnectionInfo {
  uri: string;
  dbName: string;
  /** Upper bound on pooled connections held by the client. */
  maxPoolSize: number;
  /** Write concern timeout. */
  wtimeoutMS: number;
  serverSelectionTimeoutMS: number;
}

export interface StoreCursor<T> {
  toArray(): Promise<T[]>;
}

export interface StoreFindCursor<T> extends StoreCursor<T> {
  sort(sort: Sort): StoreFindCursor<T>;
  skip(value: number): StoreFindCursor<T>;
  limit(value: number): StoreFindCursor<T>;
}

export interface StoreAggregateCursor<T> extends StoreCursor<T> {
  next(): Promise<T | null>;
}

export interface StoreCollection<TSchema extends Document> {
  find(
    filter: Filter<TSchema>,
    options?: FindOptions
  ): StoreFindCursor<WithId<TSchema>>;
  aggregate<T extends Document = Document>(
    pipeline?: Document[],
    options?: AggregateOptions
  ): StoreAggregateCursor<T>;
  countDocuments(filter?: Filter<TSchema>): Promise<number>;
  insertOne(
    doc: OptionalUnlessRequiredId<TSchema>
  ): Promise<InsertOneResult<TSchema>>;
  updateOne(
    filter: Filter<TSchema>,
    update: UpdateFilter<TSchema>
  ): Promise<UpdateResult<TSchema>>;
  deleteOne(filter?: Filter<TSchema>): Promise<DeleteResult>;
}

/** Pool + write settings the client was built with. */
export interface IDbClientSettings {
  maxPoolSize: number;
  writeConcern: { w?: number | string; wtimeoutMS?: number };
}

export interface IDbFactory {
  /**
   * Establish a connection (idempotent). Multiple calls are safe.
   */
  connect(info: IDbConnectionInfo): Promise<void>;

  /**
   * Close connection (idempotent).
   */
  close(): Promise<void>;

  isConnected(): boolean;

  /**
   * Obtain a collection handle. Throws if not connected.
   */
  getCollection<T extends Document>(
    name: string,
    dbName: string
  ): StoreCollection<T>;

  /** Run a database command (e.g. `connectionStatus`). */
  runCommand(dbName: string, command: Document): Promise<Document>;

  settings(): IDbClientSettings;
}
