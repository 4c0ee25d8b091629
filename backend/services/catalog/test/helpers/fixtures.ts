// backend/services/catalog/test/helpers/fixtures.ts
import { ObjectId } from "mongodb";
import { DbClient } from "@catalog/shared/db/DbClient";
import type { StoredDoc } from "./fakeStore";
import { FakeDbFactory, FakeStore, TEST_CONNECTION } from "./fakeStore";

/** Deterministic ids: oid(1) < oid(2) < ... */
export function oid(n: number): ObjectId {
  return new ObjectId(n.toString(16).padStart(24, "0"));
}

export type MovieSeed = {
  n: number;
  title?: string;
  cast?: string[];
  genres?: string[];
  countries?: string[];
  runtime?: number | null;
  metacritic?: number | null;
  numReviews?: number;
};

export function movie(seed: MovieSeed): StoredDoc {
  const doc: StoredDoc = {
    _id: oid(seed.n),
    title: seed.title ?? `Movie ${seed.n}`,
    cast: seed.cast ?? [],
    genres: seed.genres ?? [],
    countries: seed.countries ?? [],
  };
  if (seed.runtime !== undefined) doc.runtime = seed.runtime;
  if (seed.metacritic !== undefined) doc.metacritic = seed.metacritic;
  if (seed.numReviews !== undefined)
    doc.tomatoes = { viewer: { numReviews: seed.numReviews } };
  return doc;
}

export function comment(
  n: number,
  movieId: ObjectId,
  email: string,
  date: string
): StoredDoc {
  return {
    _id: oid(10_000 + n),
    movie_id: movieId,
    name: email.split("@")[0],
    email,
    text: `comment ${n}`,
    date: new Date(date),
  };
}

export async function connectedClient(
  store: FakeStore = new FakeStore()
): Promise<{ db: DbClient; factory: FakeDbFactory; store: FakeStore }> {
  const factory = new FakeDbFactory(store);
  const db = new DbClient(factory, TEST_CONNECTION);
  await db.connect();
  return { db, factory, store };
}
