// backend/services/catalog/test/catalogService.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { CatalogService } from "../src/CatalogService";
import { PreconditionViolatedError, StoreFailureError } from "../src/errors";
import type { FakeDbFactory, FakeStore } from "./helpers/fakeStore";
import { connectedClient, movie, oid } from "./helpers/fixtures";

type LogLine = Record<string, unknown>;

function captureLogger(lines: LogLine[]) {
  return pino(
    { level: "debug", base: {} },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    }
  );
}

describe("CatalogService", () => {
  let store: FakeStore;
  let factory: FakeDbFactory;
  let catalog: CatalogService;
  let lines: LogLine[];

  beforeEach(async () => {
    const ctx = await connectedClient();
    store = ctx.store;
    factory = ctx.factory;
    store.seed("movies", [
      movie({ n: 1, title: "Harbor Lights", countries: ["USA"], genres: ["Drama", "Romance"] }),
      movie({ n: 2, title: "Space Run", countries: ["France", "USA"], genres: ["Action", "Drama"] }),
      movie({ n: 3, title: "Quiet Field", countries: ["Italy"], genres: ["Comedy"] }),
    ]);
    lines = [];
    catalog = CatalogService.create(ctx.db, { logger: captureLogger(lines) });
  });

  it("wraps successful reads in an ok result", async () => {
    const res = await catalog.fetchMovies({ kind: "genres", names: ["Comedy"] }, 0, 5);

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.totalCount).toBe(1);
    expect(res.value.movies.map((m) => m.title)).toEqual(["Quiet Field"]);
  });

  it("rethrows precondition violations and logs them at error", async () => {
    await expect(catalog.fetchMovies({ kind: "none" }, -1, 5)).rejects.toBeInstanceOf(
      PreconditionViolatedError
    );
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 50,
      component: "CatalogService",
      op: "fetchMovies",
      err: "page must be an integer >= 0, got -1",
      msg: "precondition violated",
    });
  });

  it("turns driver failures into StoreFailureError and logs once", async () => {
    store.collection("movies").failNext(new Error("server selection timed out"));

    const res = await catalog.fetchMovies({ kind: "none" }, 0, 5);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(StoreFailureError);
    expect(res.error.code).toBe("STORE_FAILURE");
    expect(res.error.message).toBe("fetchMovies failed: server selection timed out");

    const warnings = lines.filter((l) => l.msg === "catalog operation failed");
    expect(warnings).toEqual([
      expect.objectContaining({
        level: 40,
        op: "fetchMovies",
        code: "STORE_FAILURE",
        err: "fetchMovies failed: server selection timed out",
      }),
    ]);
  });

  it("lists titles by country", async () => {
    const res = await catalog.moviesByCountry(["Italy", "France"]);

    expect(res).toEqual({
      ok: true,
      value: [
        { _id: oid(2), title: "Space Run" },
        { _id: oid(3), title: "Quiet Field" },
      ],
    });
    expect(store.collection("movies").findCalls[0]).toMatchObject({
      filter: { countries: { $in: ["Italy", "France"] } },
      options: { projection: { title: 1 } },
    });
  });

  it("lists distinct genres alphabetically", async () => {
    expect(await catalog.allGenres()).toEqual({
      ok: true,
      value: ["Action", "Comedy", "Drama", "Romance"],
    });
  });

  it("lists no genres for an empty catalog", async () => {
    store.docs("movies").length = 0;
    expect(await catalog.allGenres()).toEqual({ ok: true, value: [] });
  });

  it("adds a comment through the facade", async () => {
    const res = await catalog.addComment({
      movieId: oid(1).toHexString(),
      name: "Ann",
      email: "ann@example.com",
      text: "lovely",
      date: new Date("2024-01-01T00:00:00Z"),
    });

    expect(res.ok).toBe(true);
    expect(store.docs("comments")).toHaveLength(1);
    expect(store.docs("comments")[0].movie_id).toEqual(oid(1));
  });

  describe("describeConnection", () => {
    it("reports pool size, write concern and the authenticated role", async () => {
      factory.commandReply = {
        ok: 1,
        authInfo: {
          authenticatedUsers: [{ user: "test-user", db: "admin" }],
          authenticatedUserRoles: [{ role: "readWrite", db: "catalog_test" }],
        },
      };

      expect(await catalog.describeConnection()).toEqual({
        ok: true,
        value: {
          maxPoolSize: 50,
          writeConcern: { w: "majority", wtimeoutMS: 2500 },
          role: { role: "readWrite", db: "catalog_test" },
        },
      });
      expect(factory.commandCalls).toEqual([{ connectionStatus: 1 }]);
    });

    it("reports a null role when unauthenticated", async () => {
      const res = await catalog.describeConnection();
      expect(res.ok && res.value.role).toBeNull();
    });

    it("fails with StoreFailureError on an unexpected status shape", async () => {
      factory.commandReply = { ok: 1, authInfo: "n/a" };

      const res = await catalog.describeConnection();

      expect(res.ok).toBe(false);
      if (res.ok) return;
      expect(res.error).toBeInstanceOf(StoreFailureError);
      expect(res.error).toMatchObject({ operation: "describeConnection" });
    });
  });
});
